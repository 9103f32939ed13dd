/**
 * Naming and defaults for custom models and records
 */

import type { FieldValues, RecordId } from '@ledgerlink/core';

const CUSTOM_PREFIX = /^x_.+/;

function withCustomPrefix(name: string): string {
  return CUSTOM_PREFIX.test(name) ? name : `x_${name}`;
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * 'Book Club' → 'x_book_club'. Custom models must carry the x_ prefix.
 */
export function technicalModelName(displayName: string): string {
  return withCustomPrefix(displayName.toLowerCase().replace(/ /g, '_'));
}

/**
 * Values used by createRecord when the payload is empty:
 * 'res.partner' → { name: 'New Res' }
 */
export function defaultRecordValues(modelName: string): FieldValues {
  const [head = modelName] = modelName.split('.', 1);
  return { name: `New ${capitalize(head)}` };
}

/**
 * Complete `ir.model.fields` values for a new model.
 * Every field is manual and of type char unless it says otherwise; names
 * default to '<model>_field_<index>' and always carry the x_ prefix.
 */
export function buildFieldDefinitions(
  modelId: RecordId,
  technicalName: string,
  fields: FieldValues[]
): FieldValues[] {
  return fields.map((field, index) => {
    const definition: FieldValues = {
      model_id: modelId,
      state: 'manual',
      ttype: 'char',
      name: `${technicalName}_field_${index}`,
      ...field,
    };

    const name = field['name'];
    if (typeof name === 'string') {
      definition['name'] = withCustomPrefix(name);
    }
    return definition;
  });
}

/**
 * Odoo's search_count takes no offset; apply pagination to the total.
 * A limit of 0 means no limit, as for search.
 */
export function paginateCount(total: number, offset?: number, limit?: number): number {
  const remaining = Math.max(total - (offset ?? 0), 0);
  return limit ? Math.min(remaining, limit) : remaining;
}
