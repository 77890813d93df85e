import {
  Int32,
  ListOf,
  ObjectType,
  StringType,
  arrayOf
} from '../metadata/builtins';
import { defineClass, defineStruct } from '../metadata/define';
import { type DataMemberDescriptor, type MethodDescriptor, property } from '../metadata/members';
import type { RuntimeType } from '../metadata/runtime-type';
import { List } from '../runtime/collections';

/**
 * `Root.middle.leaf.value`: a three-link reference chain ending in `Int32`.
 */
export const Leaf = defineClass({
  name: 'Leaf',
  create: () => ({ value: 0 }),
  members: () => [property('value', Int32)]
});

export const Middle = defineClass({
  name: 'Middle',
  create: () => ({ leaf: null }),
  members: () => [property('leaf', Leaf)]
});

export const Root = defineClass({
  name: 'Root',
  create: () => ({ middle: null, label: null }),
  members: () => [property('middle', Middle), property('label', StringType)]
});

/**
 * `Outer.inner.x`: a chain of value types.
 */
export const Inner = defineStruct({
  name: 'Inner',
  create: () => ({ x: 0 }),
  members: () => [property('x', Int32)]
});

export const Outer = defineStruct({
  name: 'Outer',
  create: () => ({ inner: { x: 0 } }),
  members: () => [property('inner', Inner)]
});

/**
 * Self-referencing tree types for depth-limited mapping.
 */
export const TreeNode = defineClass({
  name: 'TreeNode',
  create: () => ({ name: null, children: null }),
  members: self => [
    property('name', StringType),
    property('children', ListOf.makeGenericType(self))
  ]
});

export const TreeNodeDto = defineClass({
  name: 'TreeNodeDto',
  create: () => ({ name: null, children: null }),
  members: self => [
    property('name', StringType),
    property('children', ListOf.makeGenericType(self))
  ]
});

export type TreeNodeValue = {
  name: string;
  children: List<TreeNodeValue>;
};

/**
 * A chain of `depth` nodes, each with a single child.
 */
export function buildChainTree(depth: number): TreeNodeValue {
  let node: TreeNodeValue = { name: `node-${depth}`, children: new List() };
  for (let level = depth - 1; level >= 1; level--) {
    node = { name: `node-${level}`, children: new List([node]) };
  }
  return node;
}

/**
 * An order with an array of quantities and a customer name.
 */
export const Customer = defineClass({
  name: 'Customer',
  create: () => ({ name: null }),
  members: () => [property('name', StringType)]
});

export const Order = defineClass({
  name: 'Order',
  create: () => ({ customer: null, quantities: null, total: 0 }),
  members: () => [
    property('customer', Customer),
    property('quantities', arrayOf(Int32)),
    property('total', Int32)
  ]
});

export const OrderDto = defineClass({
  name: 'OrderDto',
  create: () => ({ customerName: null, quantities: null, total: 0 }),
  members: () => [
    property('customerName', StringType),
    property('quantities', ListOf.makeGenericType(Int32)),
    property('total', Int32)
  ]
});

/**
 * Holder of an arbitrary member type, for collection destination tests.
 */
export function defineHolder(name: string, memberType: RuntimeType, readOnly = false): RuntimeType {
  return defineClass({
    name,
    create: () => ({ items: null }),
    members: () => [property('items', memberType, { readOnly })]
  });
}

export const ObjectListType = ListOf.makeGenericType(ObjectType);

export function requireProperty(type: RuntimeType, name: string): DataMemberDescriptor {
  const found = type.getInheritedProperty(name);
  if (!found) throw new Error(`Test fixture ${type.name} has no property ${name}.`);
  return found;
}

export function requireMethod(type: RuntimeType, name: string): MethodDescriptor {
  const found = type.getInheritedMethod(name);
  if (!found) throw new Error(`Test fixture ${type.name} has no method ${name}.`);
  return found;
}

/**
 * Narrows a mapped value to a {@link List} for assertions.
 */
export function expectList(value: unknown): List<unknown> {
  if (!(value instanceof List)) {
    throw new Error(`Expected a List, got ${typeof value}.`);
  }
  return value;
}
