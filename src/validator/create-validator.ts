import {
  parseValidatorConfig,
  type ValidatorConfig,
} from "../config/validator-config";
import { schemaName } from "../core/schema";
import type { OutputOf, Schema, ValidateOptions } from "../core/types";
import {
  validate,
  validateJson,
  validateOrThrow,
  validateStrings,
  type ValidationResult,
} from "./validate";

export type Validator<S extends Schema> = {
  readonly schema: S;
  readonly title: string;
  validate(input: unknown, options?: ValidateOptions): ValidationResult<OutputOf<S>>;
  validateStrings(
    input: unknown,
    options?: ValidateOptions
  ): ValidationResult<OutputOf<S>>;
  validateJson(
    json: string | Uint8Array,
    options?: ValidateOptions
  ): ValidationResult<OutputOf<S>>;
  validateOrThrow(input: unknown, options?: ValidateOptions): OutputOf<S>;
};

/**
 * Binds a schema to a checked configuration. Per-call options override the
 * configured defaults.
 */
export function createValidator<S extends Schema>(
  schema: S,
  config?: ValidatorConfig
): Validator<S> {
  const defaults = parseValidatorConfig(config);
  const title = defaults.title ?? schemaName(schema);
  // an option left undefined falls back to the configured default
  const resolve = (options: ValidateOptions = {}): ValidateOptions => ({
    strict: options.strict ?? defaults.strict,
    onError: options.onError ?? defaults.onError,
    docsUrl: options.docsUrl ?? defaults.docsUrl,
    title: options.title ?? title,
  });

  return Object.freeze({
    schema,
    title,
    validate: (input: unknown, options?: ValidateOptions) =>
      validate(schema, input, resolve(options)),
    validateStrings: (input: unknown, options?: ValidateOptions) =>
      validateStrings(schema, input, resolve(options)),
    validateJson: (json: string | Uint8Array, options?: ValidateOptions) =>
      validateJson(schema, json, resolve(options)),
    validateOrThrow: (input: unknown, options?: ValidateOptions) =>
      validateOrThrow(schema, input, resolve(options)),
  });
}
