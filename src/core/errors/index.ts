export { AINError, ErrorCode, isAINError, wrapError } from './AINError';
