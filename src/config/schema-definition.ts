/**
 * JSON-compatible schema descriptors, checked with zod and turned into
 * engine schemas.
 */

import { z } from "zod";

import {
  boolSchema,
  dateSchema,
  datetimeSchema,
  dictSchema,
  floatSchema,
  intSchema,
} from "../core/schema";
import type { Schema } from "../core/types";
import { SchemaDefinitionError } from "../errors/types";

export type ScalarDefinition = {
  type: "bool" | "int" | "float" | "date" | "datetime";
};

export type DictDefinition = {
  type: "dict";
  keys_schema: SchemaDefinition;
  values_schema: SchemaDefinition;
  min_length?: number;
  max_length?: number;
};

export type SchemaDefinition = ScalarDefinition | DictDefinition;

const lengthBound = z.number().int().nonnegative().optional();

export const schemaDefinitionSchema: z.ZodType<SchemaDefinition> = z.lazy(() =>
  z.union([
    z.strictObject({
      type: z.enum(["bool", "int", "float", "date", "datetime"]),
    }),
    z
      .strictObject({
        type: z.literal("dict"),
        keys_schema: schemaDefinitionSchema,
        values_schema: schemaDefinitionSchema,
        min_length: lengthBound,
        max_length: lengthBound,
      })
      .refine(
        (def) =>
          def.min_length === undefined ||
          def.max_length === undefined ||
          def.min_length <= def.max_length,
        { message: "min_length must not exceed max_length" }
      ),
  ])
);

function toSchema(definition: SchemaDefinition): Schema {
  switch (definition.type) {
    case "bool":
      return boolSchema();
    case "int":
      return intSchema();
    case "float":
      return floatSchema();
    case "date":
      return dateSchema();
    case "datetime":
      return datetimeSchema();
    case "dict":
      return dictSchema(
        toSchema(definition.keys_schema),
        toSchema(definition.values_schema),
        {
          minLength: definition.min_length,
          maxLength: definition.max_length,
        }
      );
    default:
      return definition;
  }
}

/**
 * Builds a schema from a descriptor such as
 * `{ "type": "dict", "keys_schema": { "type": "int" }, "values_schema": { "type": "date" } }`.
 */
export function schemaFromDefinition(definition: unknown): Schema {
  const result = schemaDefinitionSchema.safeParse(definition);
  if (!result.success) {
    throw new SchemaDefinitionError(
      `Invalid schema definition: ${z.prettifyError(result.error)}`,
      result.error
    );
  }
  return toSchema(result.data);
}
