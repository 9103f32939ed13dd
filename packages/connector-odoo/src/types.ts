import type {
  Domain,
  FieldValues,
  FilterCondition,
  RecordId,
} from '@ledgerlink/core';

/** Authenticated context reused by every object call */
export interface Session {
  database: string;
  uid: number;
  password: string;
}

/** Access rights checked by `check_access_rights` */
export type AccessRight = 'read' | 'write' | 'create' | 'unlink';

/** Raw domain or unified filter conditions; empty matches everything */
export type Filter = Domain | FilterCondition[];

export interface Pagination {
  /** Number of matching records to skip */
  offset?: number;
  /** Max records to return; omitted or 0 means no limit */
  limit?: number;
}

export interface SearchRequest extends Pagination {
  modelName?: string;
  filter?: Filter;
}

export interface ReadRequest extends SearchRequest {
  /** Fields to return (empty = all) */
  fields?: string[];
}

export interface FieldsRequest {
  modelName?: string;
  /** Field attributes to return (empty = string, help, type) */
  attributes?: string[];
}

export interface CreateRecordRequest {
  modelName?: string;
  fields?: FieldValues;
}

export interface UpdateRecordRequest {
  modelName?: string;
  ids?: RecordId[];
  fields?: FieldValues;
}

export interface DeleteRecordRequest {
  modelName?: string;
  ids?: RecordId[];
}

export interface CreateModelRequest {
  /** Display name, e.g. 'Book Club'; the technical name becomes 'x_book_club' */
  modelName?: string;
  /** Field definitions as `ir.model.fields` values */
  fields?: FieldValues[];
}
