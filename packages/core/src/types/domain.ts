/**
 * Remote search domains
 *
 * A domain is a prefix-notation list of leaves `[field, operator, value]` and
 * the logical operators '&', '|' and '!'. Consecutive leaves are AND-ed.
 * An empty domain matches every record.
 */

export type DomainLogicalOperator = '&' | '|' | '!';

export type DomainLeaf = [field: string, operator: string, value: unknown];

export type DomainTerm = DomainLeaf | DomainLogicalOperator;

export type Domain = DomainTerm[];
