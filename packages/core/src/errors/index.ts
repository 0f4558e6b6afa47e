export { WriterSinkConfigError, serialiseError, toError, type SerialisedError } from './errors.js';
