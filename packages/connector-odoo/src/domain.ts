/**
 * Odoo Domain Filter Conversion
 *
 * Converts the unified filter syntax to Odoo's domain format.
 * Odoo domains: [['field', 'operator', 'value'], ...]
 */

import type {
  Domain,
  DomainLeaf,
  DomainTerm,
  FilterCondition,
  FilterOperator,
} from '@ledgerlink/core';
import type { Filter } from './types.js';

/**
 * Map our filter operators to Odoo operators
 */
const OPERATOR_MAP: { [K in FilterOperator]: string } = {
  eq: '=',
  neq: '!=',
  gt: '>',
  lt: '<',
  gte: '>=',
  lte: '<=',
  contains: 'ilike',
  in: 'in',
};

/**
 * Convert a single filter condition to Odoo domain leaf
 */
function conditionToLeaf(condition: FilterCondition): DomainLeaf {
  // ilike already matches substrings; no % wrapping needed
  return [condition.field, OPERATOR_MAP[condition.op], condition.value];
}

/**
 * Convert unified filter conditions to an Odoo domain.
 * Conditions are AND-ed, which matches Odoo's default for consecutive leaves.
 */
export function toDomain(conditions?: FilterCondition[]): Domain {
  if (!conditions || conditions.length === 0) {
    return [];
  }

  return conditions.map(conditionToLeaf);
}

function isCondition(term: DomainTerm | FilterCondition): term is FilterCondition {
  return typeof term === 'object' && !Array.isArray(term);
}

/**
 * Accept either form of filter and return a domain
 */
export function normalizeFilter(filter: Filter | undefined): Domain {
  if (!filter || filter.length === 0) {
    return [];
  }

  const terms: (DomainTerm | FilterCondition)[] = filter;
  const conditions = terms.filter(isCondition);
  if (conditions.length === terms.length) {
    return toDomain(conditions);
  }

  return terms.filter((term): term is DomainTerm => !isCondition(term));
}
