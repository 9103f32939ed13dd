export {
  ConnectorError,
  wrapError,
  type ErrorCode,
  type ConnectorErrorDetails,
} from './connector-error.js';
