import { describe, expect, it, test } from 'vitest';
import { Int32, StringType } from '../../metadata/builtins';
import { defineClass } from '../../metadata/define';
import { property } from '../../metadata/members';
import { ConfigurationError, LambdaParseError } from '../../errors';
import { formatExpression } from '../../ir/printer';
import { DEFAULT_PROFILE } from '../../types/configuration';
import {
  MapperConfiguration,
  type TypeMapDefinition,
  defineTypeMap,
  validateTypeMapDefinition
} from '../configuration';
import { Customer, Order, OrderDto } from '../../tests/fixtures';
import { type TestScenario, resolveInput } from '../../tests/types';

type OrderShape = { customer: { name: string }; total: number };

const BaseDto = defineClass({
  name: 'BaseDto',
  create: () => ({ id: 0 }),
  members: () => [property('id', Int32)]
});

const LabelledDto = defineClass({
  name: 'LabelledDto',
  baseType: BaseDto,
  create: () => ({ id: 0, label: null }),
  members: () => [property('label', StringType)]
});

const LabelledRecord = defineClass({
  name: 'LabelledRecord',
  create: () => ({ id: 0, label: null }),
  members: () => [property('id', Int32), property('label', StringType)]
});

function memberNames(configuration: MapperConfiguration, source = Order, destination = OrderDto) {
  return configuration
    .resolveTypeMap(source, destination)
    ?.memberMaps.map(memberMap => memberMap.destinationMember.name);
}

/**
 * Test suite: type map definitions and the configuration built from them.
 */
describe('Mapper Configuration', () => {
  describe('validateTypeMapDefinition', () => {
    const scenarios: TestScenario<TypeMapDefinition, string>[] = [
      {
        id: 'Negative Depth',
        description: 'rejects a negative maxDepth',
        input: { source: Order, destination: OrderDto, maxDepth: -1 },
        expected:
          '[mapping-plan] Invalid maxDepth for "Order -> OrderDto": Expected a non-negative integer, got -1.'
      },
      {
        id: 'Fractional Depth',
        description: 'rejects a fractional maxDepth',
        input: { source: Order, destination: OrderDto, maxDepth: 1.5 },
        expected:
          '[mapping-plan] Invalid maxDepth for "Order -> OrderDto": Expected a non-negative integer, got 1.5.'
      },
      {
        id: 'Unknown Members',
        description: 'lists every unknown destination member',
        input: { source: Order, destination: OrderDto, members: { nope: {}, other: { ignore: true } } },
        expected: '[mapping-plan] Unknown destination members for "Order -> OrderDto": "nope", "other"'
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(() => validateTypeMapDefinition(resolveInput(input))).toThrow(expected);
    });

    it('returns a valid definition unchanged', () => {
      const definition = defineTypeMap({ source: Order, destination: OrderDto, maxDepth: 0 });
      expect(validateTypeMapDefinition(definition)).toBe(definition);
    });

    it('accepts members declared on a base type', () => {
      const definition = { source: LabelledRecord, destination: LabelledDto, members: { id: {} } };
      expect(() => validateTypeMapDefinition(definition)).not.toThrow();
    });
  });

  describe('MapperConfiguration', () => {
    it('applies profile overrides over the defaults', () => {
      const configuration = new MapperConfiguration({
        profile: { allowNullCollections: true },
        typeMaps: []
      });
      expect(configuration.profile).toEqual({ ...DEFAULT_PROFILE, allowNullCollections: true });
    });

    it('rejects two maps for the same pair', () => {
      const definition = { source: Order, destination: OrderDto };
      expect(() => new MapperConfiguration({ typeMaps: [definition, definition] })).toThrow(
        new ConfigurationError('[mapping-plan] Duplicate type map for "Order -> OrderDto"')
      );
    });

    it('maps destination members that have a source member of the same name', () => {
      const configuration = new MapperConfiguration({
        typeMaps: [{ source: Order, destination: OrderDto }]
      });
      expect(memberNames(configuration)).toEqual(['quantities', 'total']);
    });

    it('parses mapFrom into the member source expression', () => {
      const configuration = new MapperConfiguration({
        typeMaps: [
          {
            source: Order,
            destination: OrderDto,
            members: { customerName: { mapFrom: (order: OrderShape) => order.customer.name } }
          }
        ]
      });
      const [customerName] = configuration.resolveTypeMap(Order, OrderDto)?.memberMaps ?? [];

      expect(memberNames(configuration)).toEqual(['customerName', 'quantities', 'total']);
      expect(customerName && formatExpression(customerName.sourceExpression)).toBe(
        'order => order.customer.name'
      );
    });

    it('skips ignored members', () => {
      const configuration = new MapperConfiguration({
        typeMaps: [{ source: Order, destination: OrderDto, members: { total: { ignore: true } } }]
      });
      expect(memberNames(configuration)).toEqual(['quantities']);
    });

    it('includes inherited destination members after declared ones', () => {
      const configuration = new MapperConfiguration({
        typeMaps: [{ source: LabelledRecord, destination: LabelledDto }]
      });
      expect(memberNames(configuration, LabelledRecord, LabelledDto)).toEqual(['label', 'id']);
    });

    it('records member options on the member maps', () => {
      const configuration = new MapperConfiguration({
        typeMaps: [
          { source: Order, destination: OrderDto, members: { quantities: { useDestinationValue: true } } }
        ]
      });
      const typeMap = configuration.resolveTypeMap(Order, OrderDto);
      const [quantities] = typeMap?.memberMaps ?? [];

      expect(quantities).toMatchObject({ useDestinationValue: true, canBeSet: true });
      expect(quantities?.typeMap).toBe(typeMap);
    });

    it('surfaces mapFrom parse failures when the configuration is built', () => {
      expect(
        () =>
          new MapperConfiguration({
            typeMaps: [
              {
                source: Order,
                destination: OrderDto,
                members: { customerName: { mapFrom: (order: { missing: string }) => order.missing } }
              }
            ]
          })
      ).toThrow(LambdaParseError);
    });

    it('resolves maps by exact pair', () => {
      const configuration = new MapperConfiguration({
        typeMaps: [
          { source: Order, destination: OrderDto, maxDepth: 3 },
          { source: Customer, destination: Customer }
        ]
      });

      expect(configuration.resolveTypeMap(Order, OrderDto)?.maxDepth).toBe(3);
      expect(configuration.resolveTypeMap(OrderDto, Order)).toBeUndefined();
      expect(configuration.getAllTypeMaps()).toHaveLength(2);
    });
  });
});
