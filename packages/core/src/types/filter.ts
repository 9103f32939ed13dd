/**
 * Unified filter syntax, translated into a remote domain by each connector
 */

export type FilterOperator =
  | 'eq'       // equals
  | 'neq'      // not equals
  | 'gt'       // greater than
  | 'lt'       // less than
  | 'gte'      // greater than or equal
  | 'lte'      // less than or equal
  | 'contains' // string contains (case-insensitive)
  | 'in';      // value in array

export interface FilterCondition {
  field: string;
  op: FilterOperator;
  value: unknown;
}

export const FILTER_OPERATORS = [
  'eq',
  'neq',
  'gt',
  'lt',
  'gte',
  'lte',
  'contains',
  'in',
] as const satisfies readonly FilterOperator[];
