export { ok, err, attempt, andThen, settle, type Result } from './result.js';
