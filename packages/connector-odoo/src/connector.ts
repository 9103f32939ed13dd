/**
 * Odoo Connector
 *
 * Uniform envelope interface over Odoo's external API. Every operation
 * resolves (never rejects) to `{ error, <key> }`: `error` is null on success,
 * otherwise a message with the key set to null or 0.
 *
 * Authentication is lazy: the first operation resolves the session and later
 * ones reuse it.
 */

import { z } from 'zod';
import {
  ConnectorError,
  Logger,
  andThen,
  attempt,
  createTraceId,
  err,
  formatZodError,
  ok,
  settle,
  type CountEnvelope,
  type CreateEnvelope,
  type CreateModelEnvelope,
  type CreatedModel,
  type DeleteEnvelope,
  type FieldsEnvelope,
  type IdsEnvelope,
  type RecordsEnvelope,
  type Result,
  type UpdateEnvelope,
  type VersionEnvelope,
} from '@ledgerlink/core';
import { OdooClient } from './client.js';
import {
  resolveConnectionConfig,
  type ConnectionConfig,
  type ConnectionOptions,
} from './config.js';
import { normalizeFilter } from './domain.js';
import {
  buildFieldDefinitions,
  defaultRecordValues,
  paginateCount,
  technicalModelName,
} from './model-definition.js';
import {
  MODEL_NAME_REQUIRED,
  createModelRequestSchema,
  createRecordRequestSchema,
  deleteRecordRequestSchema,
  fieldsRequestSchema,
  readRequestSchema,
  searchRequestSchema,
  updateRecordRequestSchema,
} from './requests.js';
import { SessionResolver } from './session.js';
import type {
  AccessRight,
  CreateModelRequest,
  CreateRecordRequest,
  DeleteRecordRequest,
  FieldsRequest,
  Pagination,
  ReadRequest,
  SearchRequest,
  Session,
  UpdateRecordRequest,
} from './types.js';

export const DEFAULT_FIELD_ATTRIBUTES: readonly string[] = ['string', 'help', 'type'];

export interface OdooConnectorOptions extends ConnectionOptions {
  /** Logger for session and operation events. Default: info level on stderr */
  logger?: Logger;
  /** Variables used to expand `${VAR}` in string options. Default: process.env */
  env?: NodeJS.ProcessEnv;
}

interface Runtime {
  config: ConnectionConfig;
  client: OdooClient;
  sessions: SessionResolver;
}

interface CallContext {
  client: OdooClient;
  session: Session;
}

interface OperationSpec<I> {
  name: string;
  request: unknown;
  schema: z.ZodType<I, z.ZodTypeDef, unknown>;
  rights: AccessRight[];
  /** Model whose rights are checked, when it differs from the requested one */
  accessModel?: string;
}

function pagination(input: Pagination): Pagination {
  const options: Pagination = {};
  if (input.offset !== undefined) {
    options.offset = input.offset;
  }
  if (input.limit !== undefined) {
    options.limit = input.limit;
  }
  return options;
}

function validate<I>(schema: z.ZodType<I, z.ZodTypeDef, unknown>, request: unknown): Result<I> {
  const parsed = schema.safeParse(request ?? {});
  if (parsed.success) {
    return ok(parsed.data);
  }

  const modelNameMissing = parsed.error.issues.some((issue) => issue.path[0] === 'modelName');
  return err(
    new ConnectorError({
      code: 'VALIDATION_ERROR',
      message: modelNameMissing ? MODEL_NAME_REQUIRED : formatZodError(parsed.error),
    })
  );
}

export class OdooConnector {
  private readonly runtime: Result<Runtime>;
  private readonly logger: Logger;

  constructor(options: OdooConnectorOptions = {}) {
    const { logger, env, ...connection } = options;
    const config = resolveConnectionConfig(connection, env);

    this.logger = (logger ?? new Logger()).child({
      component: 'odoo-connector',
      ...(config.ok ? { serviceUrl: config.value.serviceUrl } : {}),
    });

    if (!config.ok) {
      this.runtime = err(config.error);
      this.logger.warn('Invalid connection options', { reason: config.error.message });
      return;
    }

    const client = new OdooClient({
      serviceUrl: config.value.serviceUrl,
      timeoutMs: config.value.timeoutMs,
    });
    this.runtime = ok({
      config: config.value,
      client,
      sessions: new SessionResolver(client, config.value, this.logger),
    });
  }

  /** Normalised configuration, or null when the options were invalid */
  get config(): ConnectionConfig | null {
    return this.runtime.ok ? this.runtime.value.config : null;
  }

  /**
   * IDs of the records matching the filter
   */
  async getIds(request: SearchRequest = {}): Promise<IdsEnvelope> {
    const result = await this.run(
      { name: 'getIds', request, schema: searchRequestSchema, rights: ['read'] },
      ({ client, session }, input) =>
        client.search(session, input.modelName, normalizeFilter(input.filter), pagination(input))
    );

    return settle(
      result,
      (ids) => ({ error: null, ids }),
      (error) => ({ error, ids: null })
    );
  }

  /**
   * Records matching the filter, restricted to `fields` when given
   */
  async getRecords(request: ReadRequest = {}): Promise<RecordsEnvelope> {
    const result = await this.run(
      { name: 'getRecords', request, schema: readRequestSchema, rights: ['read'] },
      ({ client, session }, input) => {
        const options: Pagination & { fields?: string[] } = pagination(input);
        if (input.fields.length > 0) {
          options.fields = input.fields;
        }
        return client.searchRead(session, input.modelName, normalizeFilter(input.filter), options);
      }
    );

    return settle(
      result,
      (records) => ({ error: null, records }),
      (error) => ({ error, records: null })
    );
  }

  /**
   * Number of records matching the filter, after offset and limit
   */
  async getCount(request: SearchRequest = {}): Promise<CountEnvelope> {
    const result = await this.run(
      { name: 'getCount', request, schema: searchRequestSchema, rights: ['read'] },
      async ({ client, session }, input) => {
        const total = await client.searchCount(
          session,
          input.modelName,
          normalizeFilter(input.filter)
        );
        return paginateCount(total, input.offset, input.limit);
      }
    );

    return settle(
      result,
      (count) => ({ error: null, count }),
      (error) => ({ error, count: 0 as const })
    );
  }

  /**
   * Field metadata of a model, limited to the requested attributes
   */
  async getFields(request: FieldsRequest = {}): Promise<FieldsEnvelope> {
    const result = await this.run(
      { name: 'getFields', request, schema: fieldsRequestSchema, rights: ['read'] },
      ({ client, session }, input) => {
        const attributes =
          input.attributes.length > 0 ? input.attributes : [...DEFAULT_FIELD_ATTRIBUTES];
        return client.fieldsGet(session, input.modelName, attributes);
      }
    );

    return settle(
      result,
      (fields) => ({ error: null, fields }),
      (error) => ({ error, fields: null })
    );
  }

  /**
   * Create one record. Fields with a server-side default may be left out;
   * an empty payload creates a record named 'New <Model>'.
   */
  async createRecord(request: CreateRecordRequest = {}): Promise<CreateEnvelope> {
    const result = await this.run(
      {
        name: 'createRecord',
        request,
        schema: createRecordRequestSchema,
        rights: ['read', 'create'],
      },
      async ({ client, session }, input) => {
        const values =
          Object.keys(input.fields).length > 0
            ? input.fields
            : defaultRecordValues(input.modelName);

        const id = await client.create(session, input.modelName, values);
        if (id === null) {
          throw new ConnectorError({
            code: 'REMOTE_ERROR',
            message: 'The record was not created.',
            model: input.modelName,
          });
        }
        return id;
      }
    );

    return settle(
      result,
      (id) => ({ error: null, id }),
      (error) => ({ error, id: null })
    );
  }

  /**
   * Apply the same values to every given record.
   * `updated` is the number of records addressed.
   */
  async updateRecord(request: UpdateRecordRequest = {}): Promise<UpdateEnvelope> {
    const result = await this.run(
      {
        name: 'updateRecord',
        request,
        schema: updateRecordRequestSchema,
        rights: ['read', 'write'],
      },
      async ({ client, session }, input) => {
        if (Object.keys(input.fields).length > 0) {
          await client.write(session, input.modelName, input.ids, input.fields);
        }
        return input.ids.length;
      }
    );

    return settle(
      result,
      (updated) => ({ error: null, updated }),
      (error) => ({ error, updated: 0 as const })
    );
  }

  /**
   * Delete the given records. `deleted` is the number of records removed.
   */
  async deleteRecord(request: DeleteRecordRequest = {}): Promise<DeleteEnvelope> {
    const result = await this.run(
      {
        name: 'deleteRecord',
        request,
        schema: deleteRecordRequestSchema,
        rights: ['read', 'unlink'],
      },
      async ({ client, session }, input) => {
        await client.unlink(session, input.modelName, input.ids);
        return input.ids.length;
      }
    );

    return settle(
      result,
      (deleted) => ({ error: null, deleted }),
      (error) => ({ error, deleted: 0 as const })
    );
  }

  /**
   * Define a custom model with the given fields. If any field cannot be
   * created the model is removed again.
   */
  async createModel(request: CreateModelRequest = {}): Promise<CreateModelEnvelope> {
    const result = await this.run(
      {
        name: 'createModel',
        request,
        schema: createModelRequestSchema,
        rights: ['read', 'create', 'unlink'],
        accessModel: 'ir.model',
      },
      (context, input) => this.defineModel(context, input.modelName, input.fields)
    );

    return settle(
      result,
      (model) => ({ error: null, model }),
      (error) => ({ error, model: null })
    );
  }

  /**
   * Server version information. Needs no credentials.
   */
  async getVersion(): Promise<VersionEnvelope> {
    const result = await andThen(this.runtime, ({ client }) =>
      attempt(() => client.version(), 'CONNECTION_FAILED')
    );

    return settle(
      result,
      (version) => ({ error: null, version }),
      (error) => ({ error, version: null })
    );
  }

  /** Drop the cached session; the next operation authenticates again */
  resetSession(): void {
    if (this.runtime.ok) {
      this.runtime.value.sessions.reset();
    }
  }

  private async defineModel(
    { client, session }: CallContext,
    displayName: string,
    fields: Record<string, unknown>[]
  ): Promise<CreatedModel> {
    const name = technicalModelName(displayName);
    const id = await client.create(session, 'ir.model', {
      name: displayName,
      model: name,
      state: 'manual',
    });

    if (id === null) {
      throw new ConnectorError({
        code: 'REMOTE_ERROR',
        message: 'The model was not created.',
        model: name,
      });
    }

    if (fields.length > 0) {
      const created = await attempt(() =>
        client.createMany(session, 'ir.model.fields', buildFieldDefinitions(id, name, fields))
      );

      if (!created.ok) {
        const rollback = await attempt(() => client.unlink(session, 'ir.model', [id]));
        if (!rollback.ok) {
          this.logger.error('Failed to remove partially created model', {
            model: name,
            modelId: id,
            reason: rollback.error.message,
          });
        }
        throw created.error;
      }
    }

    return { id, name };
  }

  private async ensureAccess(
    { client, session }: CallContext,
    model: string,
    rights: AccessRight[]
  ): Promise<void> {
    for (const right of rights) {
      const granted = await client.checkAccessRights(session, model, right);
      if (!granted) {
        throw new ConnectorError({
          code: 'PERMISSION_DENIED',
          message: `The model does not exist or you do not have a permission to '${right}' it.`,
          model,
        });
      }
    }
  }

  /**
   * Validate → resolve session → check access → call, as one Result
   */
  private async run<I extends { modelName: string }, T>(
    spec: OperationSpec<I>,
    call: (context: CallContext, input: I) => Promise<T>
  ): Promise<Result<T>> {
    const log = this.logger.child({ operation: spec.name, traceId: createTraceId() });

    const result = await andThen(this.runtime, ({ config, client, sessions }) =>
      andThen(validate(spec.schema, spec.request), (input) =>
        sessions.resolve().then((session) =>
          andThen(session, (active) =>
            attempt(async () => {
              const context: CallContext = { client, session: active };
              if (config.checkAccessRights) {
                await this.ensureAccess(context, spec.accessModel ?? input.modelName, spec.rights);
              }
              log.debug('Calling model', { model: input.modelName });
              return call(context, input);
            })
          )
        )
      )
    );

    if (result.ok) {
      log.debug('Operation completed');
    } else {
      log.warn('Operation failed', { code: result.error.code, reason: result.error.message });
    }
    return result;
  }
}

/**
 * Factory function to create an Odoo connector
 */
export function createOdooConnector(options: OdooConnectorOptions = {}): OdooConnector {
  return new OdooConnector(options);
}
