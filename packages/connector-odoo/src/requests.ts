/**
 * Request validation for connector operations
 */

import { z } from 'zod';
import { filterSchema, limitSchema, offsetSchema } from '@ledgerlink/core';

export const MODEL_NAME_REQUIRED = 'Model name is required.';

const modelName = z.string().trim().min(1, MODEL_NAME_REQUIRED);

const fieldValues = z.record(z.unknown(), {
  invalid_type_error: 'Expected a mapping of field names to values',
});

const recordIds = z.array(z.number().int().positive());

export const searchRequestSchema = z.object({
  modelName,
  filter: filterSchema.default([]),
  offset: offsetSchema.optional(),
  limit: limitSchema.optional(),
});

export const readRequestSchema = searchRequestSchema.extend({
  fields: z.array(z.string().min(1)).default([]),
});

export const fieldsRequestSchema = z.object({
  modelName,
  attributes: z.array(z.string().min(1)).default([]),
});

export const createRecordRequestSchema = z.object({
  modelName,
  fields: fieldValues.default({}),
});

export const updateRecordRequestSchema = z
  .object({
    modelName,
    ids: recordIds.default([]),
    fields: fieldValues.default({}),
  })
  .superRefine((request, ctx) => {
    if (request.ids.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'No records to update.' });
    }
  });

export const deleteRecordRequestSchema = z
  .object({
    modelName,
    ids: recordIds.default([]),
  })
  .superRefine((request, ctx) => {
    if (request.ids.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'No records to delete.' });
    }
  });

export const createModelRequestSchema = z.object({
  modelName,
  fields: z
    .array(fieldValues, {
      invalid_type_error: 'Incorrect fields format. Should be a list of field definitions.',
    })
    .default([]),
});
