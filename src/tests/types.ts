/**
 * Scenario input for table-driven tests.
 *
 * Use a builder function when the input needs fresh IR nodes or runtime
 * objects per run.
 */
export type ScenarioInput<T> = T | (() => T);

/**
 * Represents a single row of data in a table-driven test.
 *
 * @template TInput - The type of the input payload.
 * @template TExpected - The type of the expected result.
 */
export type TestScenario<TInput = unknown, TExpected = unknown> = {
  /**
   * A short, unique identifier for the scenario.
   */
  id: string;

  /**
   * A human-readable explanation of the test logic and expected behavior.
   */
  description: string;

  /**
   * The input payload for the test case.
   */
  input: ScenarioInput<TInput>;

  /**
   * The expected output from the function under test.
   */
  expected: TExpected;
};

/**
 * Resolves a scenario input, calling it when it is a builder.
 */
export function resolveInput<T>(input: ScenarioInput<T>): T {
  return typeof input === 'function' ? (input as () => T)() : input;
}
