export { OdooClient, type OdooClientConfig } from './client.js';
export {
  OdooConnector,
  createOdooConnector,
  DEFAULT_FIELD_ATTRIBUTES,
  type OdooConnectorOptions,
} from './connector.js';
export {
  DEFAULT_HOST,
  DEFAULT_TIMEOUT_MS,
  loadConnectionOptionsFromEnv,
  normalizeServiceUrl,
  resolveConnectionConfig,
  type ConnectionConfig,
  type ConnectionOptions,
} from './config.js';
export { toDomain, normalizeFilter } from './domain.js';
export {
  buildFieldDefinitions,
  defaultRecordValues,
  paginateCount,
  technicalModelName,
} from './model-definition.js';
export { SessionResolver } from './session.js';
export type * from './types.js';
