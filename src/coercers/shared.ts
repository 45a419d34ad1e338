import type { ValidationState } from "../core/types";
import type { ErrorContext, ErrorKind } from "../errors/messages";
import { type LineError, lineError } from "../errors/types";
import { type InputValue, inputRaw } from "../input/canonical";

const EDGE_WHITESPACE_REGEX = /^[\t\n\v\f\r ]+|[\t\n\v\f\r ]+$/g;

export type CoerceResult<T> =
  | { ok: true; value: T }
  | { ok: false; errors: LineError[] };

export type CoerceFailure = { ok: false; errors: LineError[] };

export type Coercer<T> = (
  input: InputValue,
  state: ValidationState
) => CoerceResult<T>;

export function success<T>(value: T): CoerceResult<T> {
  return { ok: true, value };
}

export function failure(
  kind: ErrorKind,
  input: InputValue,
  context?: ErrorContext
): CoerceFailure {
  return { ok: false, errors: [lineError(kind, inputRaw(input), context)] };
}

export function failWith(error: LineError): CoerceFailure {
  return { ok: false, errors: [error] };
}

export function isStrict(state: ValidationState): boolean {
  return state.strictness === "strict";
}

/**
 * Trims the ASCII whitespace lax numeric parsing tolerates
 */
export function laxTrim(text: string): string {
  return text.replace(EDGE_WHITESPACE_REGEX, "");
}
