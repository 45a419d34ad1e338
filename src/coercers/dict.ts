import type {
  AnyDictSchema,
  Schema,
  TypedValue,
  ValidationState,
} from "../core/types";
import { CalendarDate, DateTimeValue } from "../core/values";
import { type LineError, withOuterLocation } from "../errors/types";
import {
  asLocItem,
  type InputValue,
  inputRaw,
  readMappingEntries,
} from "../input/canonical";
import {
  type CoerceFailure,
  type CoerceResult,
  failure,
  success,
} from "./shared";

const KEY_LOC_MARKER = "[key]";

export type SchemaCoercer = (
  schema: Schema,
  input: InputValue,
  state: ValidationState
) => CoerceResult<TypedValue>;

/**
 * Identity of a coerced key, used to detect two input keys that collapse
 * onto the same output key. Map-valued keys have no identity.
 */
function keyIdentity(key: TypedValue): string | undefined {
  if (key instanceof CalendarDate) {
    return `date:${key.toString()}`;
  }
  if (key instanceof DateTimeValue) {
    return `datetime:${key.toString()}`;
  }
  if (key instanceof Map) {
    return;
  }
  return `${typeof key}:${String(key)}`;
}

function checkLength(
  schema: AnyDictSchema,
  input: InputValue,
  size: number
): CoerceFailure | undefined {
  if (schema.minLength !== undefined && size < schema.minLength) {
    return failure("too_short", input, {
      field_type: "Dictionary",
      min_length: schema.minLength,
      actual_length: size,
    });
  }
  if (schema.maxLength !== undefined && size > schema.maxLength) {
    return failure("too_long", input, {
      field_type: "Dictionary",
      max_length: schema.maxLength,
      actual_length: size,
    });
  }
  return;
}

/**
 * Coerces every key and value of a mapping. Failures are collected per pair
 * and located under the original key; key failures additionally carry the
 * `[key]` marker.
 */
export function coerceDict(
  schema: AnyDictSchema,
  input: InputValue,
  state: ValidationState,
  coerceItem: SchemaCoercer
): CoerceResult<Map<TypedValue, TypedValue>> {
  if (input.kind !== "mapping") {
    return failure("dict_type", input);
  }

  const output = new Map<TypedValue, TypedValue>();
  const firstKeys = new Map<string, TypedValue>();
  const errors: LineError[] = [];

  for (const [key, value] of readMappingEntries(input)) {
    const loc = asLocItem(key);
    const keyResult = coerceItem(schema.keysSchema, key, state);
    if (!keyResult.ok) {
      for (const error of keyResult.errors) {
        errors.push(
          withOuterLocation(withOuterLocation(error, KEY_LOC_MARKER), loc)
        );
      }
    }
    const valueResult = coerceItem(schema.valuesSchema, value, state);
    if (!valueResult.ok) {
      for (const error of valueResult.errors) {
        errors.push(withOuterLocation(error, loc));
      }
    }
    if (!(keyResult.ok && valueResult.ok)) {
      continue;
    }

    const identity = keyIdentity(keyResult.value);
    const existing =
      identity === undefined ? undefined : firstKeys.get(identity);
    if (existing === undefined) {
      if (identity !== undefined) {
        firstKeys.set(identity, keyResult.value);
      }
      output.set(keyResult.value, valueResult.value);
    } else {
      state.onError?.("Duplicate key after coercion", {
        key: inputRaw(key),
        coercedKey: keyResult.value,
      });
      output.set(existing, valueResult.value);
    }
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return checkLength(schema, input, output.size) ?? success(output);
}
