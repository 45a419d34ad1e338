import { coerceBySchema } from "../coercers";
import { schemaName } from "../core/schema";
import type {
  InputMode,
  OutputOf,
  Schema,
  TypedValue,
  ValidateOptions,
  ValidationState,
} from "../core/types";
import { ValidationError } from "../errors/types";
import { type InputValue, readInput } from "../input/canonical";
import { readJsonInput } from "../input/json";

export type ValidationResult<T> =
  | { success: true; value: T }
  | { success: false; error: ValidationError };

function createState(
  mode: InputMode,
  options: ValidateOptions
): ValidationState {
  return Object.freeze({
    strictness: options.strict ? "strict" : "lax",
    mode,
    onError: options.onError,
  });
}

function run(
  schema: Schema,
  input: InputValue,
  state: ValidationState,
  options: ValidateOptions
): ValidationResult<TypedValue> {
  const result = coerceBySchema(schema, input, state);
  if (result.ok) {
    return { success: true, value: result.value };
  }
  return {
    success: false,
    error: new ValidationError(
      options.title ?? schemaName(schema),
      result.errors,
      options.docsUrl
    ),
  };
}

/**
 * Coerces a JS value against a schema. Never throws for bad input; every
 * failure in the value is reported in `error`.
 */
export function validate<S extends Schema>(
  schema: S,
  input: unknown,
  options?: ValidateOptions
): ValidationResult<OutputOf<S>>;
export function validate(
  schema: Schema,
  input: unknown,
  options: ValidateOptions = {}
): ValidationResult<TypedValue> {
  const state = createState("native", options);
  return run(schema, readInput(input, "native"), state, options);
}

/**
 * Like `validate`, but only text, bytes and mappings of them are accepted
 */
export function validateStrings<S extends Schema>(
  schema: S,
  input: unknown,
  options?: ValidateOptions
): ValidationResult<OutputOf<S>>;
export function validateStrings(
  schema: Schema,
  input: unknown,
  options: ValidateOptions = {}
): ValidationResult<TypedValue> {
  const state = createState("strings", options);
  return run(schema, readInput(input, "strings"), state, options);
}

/**
 * Parses JSON text or UTF-8 bytes, then coerces the parsed document
 */
export function validateJson<S extends Schema>(
  schema: S,
  json: string | Uint8Array,
  options?: ValidateOptions
): ValidationResult<OutputOf<S>>;
export function validateJson(
  schema: Schema,
  json: unknown,
  options: ValidateOptions = {}
): ValidationResult<TypedValue> {
  const read = readJsonInput(json);
  if (!read.ok) {
    return {
      success: false,
      error: new ValidationError(
        options.title ?? schemaName(schema),
        [read.error],
        options.docsUrl
      ),
    };
  }
  const state = createState("json", options);
  return run(schema, read.input, state, options);
}

export function validateOrThrow<S extends Schema>(
  schema: S,
  input: unknown,
  options?: ValidateOptions
): OutputOf<S>;
export function validateOrThrow(
  schema: Schema,
  input: unknown,
  options: ValidateOptions = {}
): TypedValue {
  const result = run(
    schema,
    readInput(input, "native"),
    createState("native", options),
    options
  );
  if (!result.success) {
    throw result.error;
  }
  return result.value;
}
