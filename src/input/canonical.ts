/**
 * Canonical input representation: raw JS values are classified into a tagged
 * InputValue as the coercers reach them, and text-like inputs are decoded to a
 * single string form.
 */

import type { InputMode } from "../core/types";
import { CalendarDate, DateTimeValue } from "../core/values";
import { type LineError, lineError, type LocItem } from "../errors/types";

export type MappingEntry = readonly [key: InputValue, value: InputValue];

export type InputValue =
  | { readonly kind: "text"; readonly value: string }
  | { readonly kind: "bytes"; readonly value: Uint8Array }
  | {
      readonly kind: "mapping";
      readonly value: Map<unknown, unknown> | Record<string, unknown>;
      readonly mode: InputMode;
    }
  | { readonly kind: "boolean"; readonly value: boolean }
  | { readonly kind: "number"; readonly value: number }
  | { readonly kind: "bigint"; readonly value: bigint }
  | { readonly kind: "date"; readonly value: CalendarDate }
  | { readonly kind: "datetime"; readonly value: DateTimeValue | Date }
  | { readonly kind: "unknown"; readonly value: unknown };

export type MappingInput = Extract<InputValue, { kind: "mapping" }>;

export type CanonicalResult =
  | { ok: true; text: string }
  | { ok: false; error: LineError };

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

export function isPlainObject(
  value: unknown
): value is Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function toBytes(value: unknown): Uint8Array | undefined {
  if (value instanceof Uint8Array) {
    return value;
  }
  if (ArrayBuffer.isView(value)) {
    return new Uint8Array(value.buffer, value.byteOffset, value.byteLength);
  }
  if (value instanceof ArrayBuffer) {
    return new Uint8Array(value);
  }
  return;
}

/**
 * Classifies the entries of a mapping, one level deep. Entries are only read
 * when a dict schema asks for them.
 */
export function readMappingEntries(input: MappingInput): MappingEntry[] {
  const { value, mode } = input;
  const pairs: Iterable<[unknown, unknown]> =
    value instanceof Map ? value.entries() : Object.entries(value);
  const entries: MappingEntry[] = [];
  for (const [key, item] of pairs) {
    const keyInput: InputValue =
      mode === "strings" && typeof key !== "string"
        ? { kind: "unknown", value: key }
        : readInput(key, mode);
    entries.push([keyInput, readInput(item, mode)]);
  }
  return entries;
}

function readStringLike(value: unknown, mode: InputMode): InputValue {
  if (typeof value === "string") {
    return { kind: "text", value };
  }
  const bytes = toBytes(value);
  if (bytes) {
    return { kind: "bytes", value: bytes };
  }
  if (value instanceof Map || isPlainObject(value)) {
    return { kind: "mapping", value, mode };
  }
  return { kind: "unknown", value };
}

/**
 * Classifies a raw value under the given input mode.
 *
 * `strings` mode only recognises text, bytes and mappings of them; every
 * other leaf is left as `unknown` so scalar coercers reject it.
 */
export function readInput(value: unknown, mode: InputMode): InputValue {
  if (mode === "strings") {
    return readStringLike(value, mode);
  }
  switch (typeof value) {
    case "boolean":
      return { kind: "boolean", value };
    case "number":
      return { kind: "number", value };
    case "bigint":
      return mode === "json"
        ? { kind: "unknown", value }
        : { kind: "bigint", value };
    default:
      break;
  }
  if (mode === "native") {
    if (value instanceof CalendarDate) {
      return { kind: "date", value };
    }
    if (value instanceof DateTimeValue) {
      return { kind: "datetime", value };
    }
    if (value instanceof Date && !Number.isNaN(value.getTime())) {
      return { kind: "datetime", value };
    }
  }
  return readStringLike(value, mode);
}

/**
 * The value to echo back in an error for this input
 */
export function inputRaw(input: InputValue): unknown {
  return input.value;
}

export function asLocItem(input: InputValue): LocItem {
  switch (input.kind) {
    case "text":
      return input.value;
    case "number":
      return input.value;
    case "bytes":
      return decodeUtf8(input.value) ?? String(input.value);
    default:
      return String(input.value);
  }
}

export function decodeUtf8(bytes: Uint8Array): string | undefined {
  try {
    return utf8Decoder.decode(bytes);
  } catch {
    return;
  }
}

/**
 * Decodes text-like input to its canonical string, or fails with `string_type`
 */
export function canonicalText(input: InputValue): CanonicalResult {
  if (input.kind === "text") {
    return { ok: true, text: input.value };
  }
  if (input.kind === "bytes") {
    const text = decodeUtf8(input.value);
    if (text !== undefined) {
      return { ok: true, text };
    }
  }
  return { ok: false, error: lineError("string_type", inputRaw(input)) };
}
