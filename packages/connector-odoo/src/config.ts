/**
 * Connection configuration
 *
 * Address options are expanded from the environment, then all options are
 * validated and normalised once into a frozen ConnectionConfig. Nothing here throws: problems come back as a
 * failed Result that the connector reports from every operation.
 */

import { z } from 'zod';
import {
  ConnectorError,
  err,
  expandEnvInString,
  formatZodError,
  ok,
  type Result,
} from '@ledgerlink/core';

export const DEFAULT_HOST = 'localhost:8069';
export const DEFAULT_TIMEOUT_MS = 30_000;

export interface ConnectionOptions {
  /** Full server URL (e.g. https://odoo.example.com). Takes precedence over host. */
  url?: string;
  /** 'hostname:port' of the server. Default: localhost:8069 */
  host?: string;
  /** Database name; the first database accepting the credentials when omitted */
  db?: string;
  username?: string;
  /** Password or API key */
  password?: string;
  /** Per-request timeout in milliseconds. Default: 30000 */
  timeoutMs?: number;
  /** Check the user's access rights on the model before each operation */
  checkAccessRights?: boolean;
}

export interface ConnectionConfig {
  readonly serviceUrl: string;
  readonly database?: string;
  readonly username?: string;
  readonly password?: string;
  readonly timeoutMs: number;
  readonly checkAccessRights: boolean;
}

// Empty strings count as absent
const optionalText = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value));

const connectionOptionsSchema = z
  .object({
    url: optionalText,
    host: optionalText,
    db: optionalText,
    username: optionalText,
    password: optionalText,
    timeoutMs: z.number().int().min(1).max(300_000).optional(),
    checkAccessRights: z.boolean().optional(),
  })
  .strict();

// Credentials reach the server exactly as given
const EXPANDED_OPTIONS = ['url', 'host', 'db'] as const;

function expandAddressOptions(
  options: ConnectionOptions,
  env: NodeJS.ProcessEnv
): ConnectionOptions {
  const expanded: ConnectionOptions = { ...options };
  for (const key of EXPANDED_OPTIONS) {
    const value = options[key];
    if (typeof value === 'string') {
      expanded[key] = expandEnvInString(value, { env });
    }
  }
  return expanded;
}

function configurationError(message: string, suggestion?: string): ConnectorError {
  return new ConnectorError({ code: 'CONFIGURATION_ERROR', message, suggestion });
}

/**
 * Turn a URL or 'host:port' into the base address of the service.
 * Adds http:// when no scheme is given and drops trailing slashes.
 */
export function normalizeServiceUrl(address: string): Result<string> {
  const trimmed = address.trim().replace(/\/+$/, '');
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;

  let parsed: URL;
  try {
    parsed = new URL(withScheme);
  } catch {
    return err(configurationError(`Invalid service address: ${address}`));
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return err(
      configurationError(
        `Unsupported protocol in service address: ${parsed.protocol}`,
        'Use an http:// or https:// URL.'
      )
    );
  }

  return ok(withScheme);
}

export function resolveConnectionConfig(
  options: ConnectionOptions,
  env: NodeJS.ProcessEnv = process.env
): Result<ConnectionConfig> {
  let expanded: ConnectionOptions;
  try {
    expanded = expandAddressOptions(options, env);
  } catch (error) {
    return err(configurationError(error instanceof Error ? error.message : String(error)));
  }

  const parsed = connectionOptionsSchema.safeParse(expanded);
  if (!parsed.success) {
    return err(configurationError(formatZodError(parsed.error, 'Invalid connection options')));
  }

  const { url, host, db, username, password, timeoutMs, checkAccessRights } = parsed.data;
  const serviceUrl = normalizeServiceUrl(url ?? host ?? DEFAULT_HOST);
  if (!serviceUrl.ok) {
    return err(serviceUrl.error);
  }

  return ok(
    Object.freeze({
      serviceUrl: serviceUrl.value,
      database: db,
      username,
      password,
      timeoutMs: timeoutMs ?? DEFAULT_TIMEOUT_MS,
      checkAccessRights: checkAccessRights ?? false,
    })
  );
}

/**
 * Read connection options from ODOO_URL, ODOO_HOST, ODOO_DB, ODOO_USERNAME,
 * ODOO_PASSWORD and ODOO_TIMEOUT_MS. Unset variables are left out.
 */
export function loadConnectionOptionsFromEnv(
  env: NodeJS.ProcessEnv = process.env
): ConnectionOptions {
  const options: ConnectionOptions = {};

  if (env['ODOO_URL']) options.url = env['ODOO_URL'];
  if (env['ODOO_HOST']) options.host = env['ODOO_HOST'];
  if (env['ODOO_DB']) options.db = env['ODOO_DB'];
  if (env['ODOO_USERNAME']) options.username = env['ODOO_USERNAME'];
  if (env['ODOO_PASSWORD']) options.password = env['ODOO_PASSWORD'];
  if (env['ODOO_TIMEOUT_MS']) options.timeoutMs = Number(env['ODOO_TIMEOUT_MS']);

  return options;
}
