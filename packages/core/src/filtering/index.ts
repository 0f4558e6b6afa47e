export { shouldLog } from './should-log.js';
