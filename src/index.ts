declare const __PACKAGE_VERSION__: string;

export const VERSION: string = __PACKAGE_VERSION__;

// Schema
export {
  boolSchema,
  dateSchema,
  datetimeSchema,
  dictSchema,
  type DictSchemaOptions,
  floatSchema,
  intSchema,
  schemaName,
} from "./core/schema";
// Types
export type {
  AnyDictSchema,
  BoolSchema,
  DateSchema,
  DatetimeSchema,
  DictSchema,
  FloatSchema,
  InputMode,
  IntSchema,
  OnErrorFn,
  OutputOf,
  Schema,
  SchemaType,
  Strictness,
  TypedValue,
  ValidateOptions,
} from "./core/types";
// Values
export {
  CalendarDate,
  type DateTimeFields,
  DateTimeValue,
} from "./core/values";
// Validation
export {
  createValidator,
  type Validator,
} from "./validator/create-validator";
export {
  validate,
  validateJson,
  validateOrThrow,
  validateStrings,
  type ValidationResult,
} from "./validator/validate";
// Configuration
export {
  type DictDefinition,
  type ScalarDefinition,
  type SchemaDefinition,
  schemaFromDefinition,
} from "./config/schema-definition";
export { type ValidatorConfig } from "./config/validator-config";
// Errors
export {
  ERROR_KINDS,
  type ErrorContext,
  type ErrorKind,
  renderMessage,
} from "./errors/messages";
export {
  type ErrorDetails,
  type ErrorsOptions,
  type LineError,
  type LocItem,
  SchemaDefinitionError,
  ValidationError,
} from "./errors/types";
// Literal tables
export { FALSE_LITERALS, TRUE_LITERALS } from "./coercers/bool";
