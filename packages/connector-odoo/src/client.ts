/**
 * Odoo JSON-RPC Client
 *
 * Low-level client for Odoo's external API over `/jsonrpc`.
 * Formats requests, validates responses and maps server faults onto
 * ConnectorError. It holds no session; callers pass one to object calls.
 */

import { z } from 'zod';
import {
  ConnectorError,
  formatZodError,
  type Domain,
  type ErrorCode,
  type FieldValues,
  type FieldsDescription,
  type RecordId,
  type RemoteRecord,
} from '@ledgerlink/core';
import type { AccessRight, Pagination, Session } from './types.js';

export interface OdooClientConfig {
  /** Odoo server URL without trailing slash (e.g., https://mycompany.odoo.com) */
  serviceUrl: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
}

type RpcService = 'common' | 'object' | 'db';

interface JsonRpcRequest {
  jsonrpc: '2.0';
  method: 'call';
  params: {
    service: RpcService;
    method: string;
    args: unknown[];
  };
  id: number;
}

const jsonRpcResponseSchema = z.object({
  jsonrpc: z.literal('2.0').optional(),
  id: z.union([z.number(), z.string(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number().optional(),
      message: z.string(),
      data: z
        .object({
          name: z.string().optional(),
          message: z.string().optional(),
          debug: z.string().optional(),
        })
        .passthrough()
        .optional(),
    })
    .optional(),
});

type JsonRpcFault = NonNullable<z.infer<typeof jsonRpcResponseSchema>['error']>;

const recordIdSchema = z.number().int();
const idListSchema = z.array(recordIdSchema);
const versionSchema = z.record(z.unknown());
const uidSchema = z.union([recordIdSchema, z.literal(false)]);
const databaseListSchema = z.array(z.string());
const recordsSchema = z.array(z.record(z.unknown()));
const countSchema = z.number().int().min(0);
const fieldsSchema = z.record(z.record(z.unknown()));
const createdSchema = z.union([recordIdSchema, idListSchema, z.literal(false)]);
const flagSchema = z.boolean();

/** Server exception name (last dotted segment) → error code */
const FAULT_CODES: { [name: string]: ErrorCode } = {
  AccessDenied: 'AUTHENTICATION_FAILED',
  AccessError: 'PERMISSION_DENIED',
  MissingError: 'NOT_FOUND',
  ValidationError: 'VALIDATION_ERROR',
  UserError: 'VALIDATION_ERROR',
};

function faultCode(fault: JsonRpcFault): ErrorCode {
  const name = fault.data?.name?.split('.').pop();
  return (name && FAULT_CODES[name]) || 'REMOTE_ERROR';
}

function isAbortError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    error.name === 'AbortError'
  );
}

export class OdooClient {
  private readonly config: OdooClientConfig;
  private requestId = 0;

  constructor(config: OdooClientConfig) {
    this.config = config;
  }

  get serviceUrl(): string {
    return this.config.serviceUrl;
  }

  /**
   * Get server version info (no authentication needed)
   */
  async version(): Promise<Record<string, unknown>> {
    return this.call('common', 'version', [], versionSchema);
  }

  /**
   * Authenticate against one database.
   * Resolves to the user id, or false when the credentials are refused.
   */
  async authenticate(
    database: string,
    username: string,
    password: string
  ): Promise<number | false> {
    return this.call(
      'common',
      'authenticate',
      [database, username, password, {}],
      uidSchema
    );
  }

  /**
   * List databases hosted by the server
   */
  async listDatabases(): Promise<string[]> {
    return this.call('db', 'list', [], databaseListSchema);
  }

  /**
   * Execute a method on an Odoo model
   */
  async execute<T>(
    session: Session,
    model: string,
    method: string,
    args: unknown[],
    kwargs: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    return this.call(
      'object',
      'execute_kw',
      [session.database, session.uid, session.password, model, method, args, kwargs],
      schema
    );
  }

  /**
   * Search for record IDs matching domain
   */
  async search(
    session: Session,
    model: string,
    domain: Domain = [],
    options: Pagination = {}
  ): Promise<RecordId[]> {
    return this.execute(session, model, 'search', [domain], { ...options }, idListSchema);
  }

  /**
   * Search and read in one call
   */
  async searchRead(
    session: Session,
    model: string,
    domain: Domain = [],
    options: Pagination & { fields?: string[] } = {}
  ): Promise<RemoteRecord[]> {
    return this.execute(session, model, 'search_read', [domain], { ...options }, recordsSchema);
  }

  /**
   * Count records matching domain
   */
  async searchCount(session: Session, model: string, domain: Domain = []): Promise<number> {
    return this.execute(session, model, 'search_count', [domain], {}, countSchema);
  }

  /**
   * Get field definitions for a model
   */
  async fieldsGet(
    session: Session,
    model: string,
    attributes: string[]
  ): Promise<FieldsDescription> {
    return this.execute(session, model, 'fields_get', [], { attributes }, fieldsSchema);
  }

  /**
   * Create one record. Resolves to null when the server reports nothing created.
   */
  async create(session: Session, model: string, values: FieldValues): Promise<RecordId | null> {
    const created = await this.execute(session, model, 'create', [values], {}, createdSchema);

    if (created === false) {
      return null;
    }
    if (Array.isArray(created)) {
      return created[0] ?? null;
    }
    return created;
  }

  /**
   * Create several records in one call
   */
  async createMany(session: Session, model: string, values: FieldValues[]): Promise<RecordId[]> {
    const created = await this.execute(session, model, 'create', [values], {}, createdSchema);

    if (created === false) {
      return [];
    }
    return Array.isArray(created) ? created : [created];
  }

  /**
   * Update existing records
   */
  async write(
    session: Session,
    model: string,
    ids: RecordId[],
    values: FieldValues
  ): Promise<boolean> {
    return this.execute(session, model, 'write', [ids, values], {}, flagSchema);
  }

  /**
   * Delete records
   */
  async unlink(session: Session, model: string, ids: RecordId[]): Promise<boolean> {
    return this.execute(session, model, 'unlink', [ids], {}, flagSchema);
  }

  /**
   * Whether the session user holds `right` on the model
   */
  async checkAccessRights(session: Session, model: string, right: AccessRight): Promise<boolean> {
    return this.execute(
      session,
      model,
      'check_access_rights',
      [right],
      { raise_exception: false },
      flagSchema
    );
  }

  /**
   * Make a JSON-RPC request and validate its result
   */
  private async call<T>(
    service: RpcService,
    method: string,
    args: unknown[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const request: JsonRpcRequest = {
      jsonrpc: '2.0',
      method: 'call',
      params: { service, method, args },
      id: ++this.requestId,
    };

    const endpoint = `${this.config.serviceUrl}/jsonrpc`;
    const timeoutMs = this.config.timeoutMs ?? 30_000;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    let response: Response;
    try {
      response = await fetch(endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(request),
        signal: controller.signal,
      });
    } catch (err) {
      if (isAbortError(err)) {
        throw new ConnectorError({
          code: 'TIMEOUT',
          message: `Odoo request timed out after ${timeoutMs}ms`,
          suggestion: 'Increase timeoutMs or check network connectivity.',
        });
      }

      const reason = err instanceof Error ? err.message : String(err);
      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: `Failed to connect to Odoo server: ${reason}`,
        suggestion: 'Check the Odoo server URL and network connectivity.',
        cause: err instanceof Error ? err : undefined,
      });
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: `HTTP ${response.status}: ${response.statusText}`,
        suggestion: 'Check the Odoo server URL and network connectivity.',
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new ConnectorError({
        code: 'INVALID_RESPONSE',
        message: 'Odoo server returned a body that is not JSON',
        cause: err instanceof Error ? err : undefined,
        context: { service, method },
      });
    }

    const envelope = jsonRpcResponseSchema.safeParse(body);
    if (!envelope.success) {
      throw new ConnectorError({
        code: 'INVALID_RESPONSE',
        message: formatZodError(envelope.error, 'Malformed JSON-RPC response'),
        context: { service, method },
      });
    }

    const fault = envelope.data.error;
    if (fault) {
      const errorMsg = fault.data?.message || fault.message;
      throw new ConnectorError({
        code: faultCode(fault),
        message: `Odoo error: ${errorMsg}`,
        context: { service, method, odooError: fault },
      });
    }

    const result = schema.safeParse(envelope.data.result);
    if (!result.success) {
      throw new ConnectorError({
        code: 'INVALID_RESPONSE',
        message: formatZodError(result.error, `Unexpected result from ${service}.${method}`),
        context: { service, method },
      });
    }

    return result.data;
  }
}
