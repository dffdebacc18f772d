import { AggregateFunction } from './types';

/**
 * Counts records; a commutative monoid under + with identity 0,
 * so partial counts can be merged in any order.
 */
export const countAggregate: AggregateFunction<unknown, number, number> = {
  createAccumulator: () => 0,
  add: (_value, accumulator) => accumulator + 1,
  getResult: (accumulator) => accumulator,
  merge: (a, b) => a + b
};
