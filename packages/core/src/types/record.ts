/**
 * Record and schema shapes returned by the remote service
 */

/** Identifier of a remote record */
export type RecordId = number;

/** One remote record as a field name → value mapping */
export type RemoteRecord = {
  [field: string]: unknown;
};

/** Field name → value mapping used for create and write */
export type FieldValues = {
  [field: string]: unknown;
};

/** Attributes of one field as returned by schema introspection */
export type FieldAttributes = {
  [attribute: string]: unknown;
};

/** Field name → attributes */
export type FieldsDescription = {
  [field: string]: FieldAttributes;
};

/** A model created by a connector */
export interface CreatedModel {
  /** Identifier of the model definition record */
  id: RecordId;
  /** Technical name of the model (e.g. 'x_book') */
  name: string;
}
