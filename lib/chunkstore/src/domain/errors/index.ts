export { PreconditionError, checkPrecondition } from './precondition.error';
export { InvalidCompressorOptionsError } from './invalid-compressor-options.error';
