// @asms/protocol
// Wire types, schema validation and the error taxonomy

export * from './types/index.js';

export {
  validateSchema,
  schemaError,
  assertSchema,
  describeType,
  type SchemaValidationResult,
} from './validation/schema.js';

export {
  stringSchema,
  numberSchema,
  booleanSchema,
  arraySchema,
  objectSchema,
} from './validation/builders.js';

export {
  isDynamicMap,
  requireMap,
  toNumber,
  toInt,
  readString,
  readBoolean,
  toStringList,
} from './validation/coerce.js';

export {
  UnitError,
  ERROR_CODES,
  invalidInput,
  asUnitError,
  wrapError,
  wrapWithCode,
  errorMessage,
  hasCode,
  errorCodeOf,
  sameCode,
  isNotFoundCode,
  isNotFound,
  isAlreadyExists,
  isInvalidInput,
  isTimeout,
  isRateLimited,
  errorToHttpStatus,
  toErrorInfo,
  type ErrorCode,
  type ErrorInfo,
  type UnitErrorOptions,
} from './errors.js';
