/**
 * Session resolution
 *
 * Probes the server, resolves the database (listing databases when none was
 * configured) and authenticates. The first successful session is kept until
 * reset; concurrent callers share one in-flight resolution, and a failed one
 * is dropped so the next call starts over.
 */

import {
  ConnectorError,
  attempt,
  err,
  ok,
  type ErrorCode,
  type Logger,
  type Result,
} from '@ledgerlink/core';
import type { OdooClient } from './client.js';
import type { ConnectionConfig } from './config.js';
import type { Session } from './types.js';

const CREDENTIALS_REFUSED = "Can't connect to the database using credentials provided.";

const TRANSPORT_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  'TIMEOUT',
  'CONNECTION_FAILED',
  'INVALID_RESPONSE',
]);

export class SessionResolver {
  private pending: Promise<Result<Session>> | null = null;

  constructor(
    private readonly client: OdooClient,
    private readonly config: ConnectionConfig,
    private readonly logger: Logger
  ) {}

  resolve(): Promise<Result<Session>> {
    if (this.pending) {
      return this.pending;
    }

    const resolution = this.establish().then((result) => {
      if (!result.ok && this.pending === resolution) {
        this.pending = null;
      }
      return result;
    });
    this.pending = resolution;
    return resolution;
  }

  /** Forget the cached session; the next operation authenticates again */
  reset(): void {
    this.pending = null;
  }

  private async establish(): Promise<Result<Session>> {
    const { username, password, database, serviceUrl } = this.config;

    if (!username || !password) {
      return err(
        new ConnectorError({
          code: 'CONFIGURATION_ERROR',
          message: 'Username and password are required.',
          suggestion: 'Pass username and password, or set ODOO_USERNAME and ODOO_PASSWORD.',
        })
      );
    }

    const probe = await attempt(() => this.client.version(), 'CONNECTION_FAILED');
    if (!probe.ok) {
      return err(
        new ConnectorError({
          code: 'CONNECTION_FAILED',
          message: `Can't connect to the server at ${serviceUrl}.`,
          suggestion: 'Check the server address and network connectivity.',
          cause: probe.error,
        })
      );
    }

    const candidates = database ? ok([database]) : await this.listDatabases();
    if (!candidates.ok) {
      return err(candidates.error);
    }

    for (const candidate of candidates.value) {
      const uid = await this.tryAuthenticate(candidate, username, password);
      if (!uid.ok) {
        return err(uid.error);
      }
      if (uid.value !== null) {
        this.logger.info('Session established', { database: candidate, uid: uid.value });
        return ok({ database: candidate, uid: uid.value, password });
      }
    }

    return err(
      new ConnectorError({
        code: 'AUTHENTICATION_FAILED',
        message: CREDENTIALS_REFUSED,
        suggestion: 'Check database name, username, and password/API key.',
        context: { databases: candidates.value },
      })
    );
  }

  private async listDatabases(): Promise<Result<string[]>> {
    const listed = await attempt(() => this.client.listDatabases(), 'CONNECTION_FAILED');
    if (!listed.ok) {
      return listed;
    }

    this.logger.debug('Databases listed', { count: listed.value.length });

    if (listed.value.length === 0) {
      return err(
        new ConnectorError({
          code: 'NOT_FOUND',
          message: 'No database exists on the server.',
        })
      );
    }
    return listed;
  }

  /**
   * User id, or null when this database refuses the credentials.
   * Transport failures end the resolution.
   */
  private async tryAuthenticate(
    database: string,
    username: string,
    password: string
  ): Promise<Result<number | null>> {
    const outcome = await attempt(() => this.client.authenticate(database, username, password));

    if (!outcome.ok) {
      if (TRANSPORT_CODES.has(outcome.error.code)) {
        return err(outcome.error);
      }
      this.logger.debug('Authentication failed', { database, reason: outcome.error.message });
      return ok(null);
    }
    if (outcome.value === false) {
      this.logger.debug('Credentials refused', { database });
      return ok(null);
    }
    return ok(outcome.value);
  }
}
