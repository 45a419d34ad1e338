/**
 * Core types for the coercion engine
 */

import type { CalendarDate, DateTimeValue } from "./values";

export type OnErrorFn = (
  message: string,
  metadata?: Record<string, unknown>
) => void;

export type BoolSchema = { readonly type: "bool" };
export type IntSchema = { readonly type: "int" };
export type FloatSchema = { readonly type: "float" };
export type DateSchema = { readonly type: "date" };
export type DatetimeSchema = { readonly type: "datetime" };

export interface AnyDictSchema {
  readonly type: "dict";
  readonly keysSchema: Schema;
  readonly valuesSchema: Schema;
  /** Minimum number of entries in the output mapping */
  readonly minLength?: number;
  /** Maximum number of entries in the output mapping */
  readonly maxLength?: number;
}

export interface DictSchema<K extends Schema, V extends Schema>
  extends AnyDictSchema {
  readonly keysSchema: K;
  readonly valuesSchema: V;
}

export type Schema =
  | BoolSchema
  | IntSchema
  | FloatSchema
  | DateSchema
  | DatetimeSchema
  | AnyDictSchema;

export type SchemaType = Schema["type"];

/**
 * Any value a successful coercion can produce
 */
export type TypedValue =
  | boolean
  | number
  | bigint
  | CalendarDate
  | DateTimeValue
  | Map<TypedValue, TypedValue>;

export type OutputOf<S extends Schema> = S extends BoolSchema
  ? boolean
  : S extends IntSchema
    ? number | bigint
    : S extends FloatSchema
      ? number
      : S extends DateSchema
        ? CalendarDate
        : S extends DatetimeSchema
          ? DateTimeValue
          : S extends DictSchema<infer K extends Schema, infer V extends Schema>
            ? Map<OutputOf<K>, OutputOf<V>>
            : never;

export type Strictness = "strict" | "lax";

/**
 * How raw JS values are classified before coercion
 */
export type InputMode = "native" | "strings" | "json";

/**
 * Read-only state threaded through one validation call
 */
export type ValidationState = {
  readonly strictness: Strictness;
  readonly mode: InputMode;
  readonly onError?: OnErrorFn;
};

export type ValidateOptions = {
  /** Coerce under the strict policy (default: lax) */
  strict?: boolean;
  /** Diagnostics callback */
  onError?: OnErrorFn;
  /** Base URL for per-kind error documentation links */
  docsUrl?: string;
  /** Title used in the message of a thrown ValidationError */
  title?: string;
};
