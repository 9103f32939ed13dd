/**
 * Result envelopes
 *
 * Every public connector operation resolves to exactly one of these shapes.
 * `error: null` means success and the operation's key holds the payload;
 * otherwise `error` holds a message and the key holds the failure value
 * (`null`, or `0` for count-like keys).
 */

import type {
  CreatedModel,
  FieldsDescription,
  RecordId,
  RemoteRecord,
} from './record.js';

export type ResultEnvelope<K extends string, T, F = null> =
  | ({ error: null } & { [P in K]: T })
  | ({ error: string } & { [P in K]: F });

export type IdsEnvelope = ResultEnvelope<'ids', RecordId[]>;
export type RecordsEnvelope = ResultEnvelope<'records', RemoteRecord[]>;
export type CountEnvelope = ResultEnvelope<'count', number, 0>;
export type FieldsEnvelope = ResultEnvelope<'fields', FieldsDescription>;
export type CreateEnvelope = ResultEnvelope<'id', RecordId>;
export type UpdateEnvelope = ResultEnvelope<'updated', number, 0>;
export type DeleteEnvelope = ResultEnvelope<'deleted', number, 0>;
export type CreateModelEnvelope = ResultEnvelope<'model', CreatedModel>;
export type VersionEnvelope = ResultEnvelope<'version', { [key: string]: unknown }>;
