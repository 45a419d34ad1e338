import type { Schema, TypedValue, ValidationState } from "../core/types";
import { SchemaDefinitionError } from "../errors/types";
import type { InputValue } from "../input/canonical";
import { coerceBool } from "./bool";
import { coerceDate } from "./date";
import { coerceDatetime } from "./datetime";
import { coerceDict } from "./dict";
import { coerceFloat } from "./float";
import { coerceInt } from "./int";
import type { CoerceResult } from "./shared";

/**
 * Dispatches one input to the coercer of its schema variant
 */
export function coerceBySchema(
  schema: Schema,
  input: InputValue,
  state: ValidationState
): CoerceResult<TypedValue> {
  switch (schema.type) {
    case "bool":
      return coerceBool(input, state);
    case "int":
      return coerceInt(input, state);
    case "float":
      return coerceFloat(input, state);
    case "date":
      return coerceDate(input, state);
    case "datetime":
      return coerceDatetime(input, state);
    case "dict":
      return coerceDict(schema, input, state, coerceBySchema);
    default:
      return unknownSchema(schema);
  }
}

function unknownSchema(schema: never): never {
  throw new SchemaDefinitionError(`Unknown schema: ${JSON.stringify(schema)}`);
}
