import type {
  BoolSchema,
  DateSchema,
  DatetimeSchema,
  DictSchema,
  FloatSchema,
  IntSchema,
  Schema,
} from "./types";

export function boolSchema(): BoolSchema {
  return Object.freeze({ type: "bool" });
}

export function intSchema(): IntSchema {
  return Object.freeze({ type: "int" });
}

export function floatSchema(): FloatSchema {
  return Object.freeze({ type: "float" });
}

export function dateSchema(): DateSchema {
  return Object.freeze({ type: "date" });
}

export function datetimeSchema(): DatetimeSchema {
  return Object.freeze({ type: "datetime" });
}

export type DictSchemaOptions = {
  minLength?: number;
  maxLength?: number;
};

export function dictSchema<K extends Schema, V extends Schema>(
  keysSchema: K,
  valuesSchema: V,
  options: DictSchemaOptions = {}
): DictSchema<K, V> {
  const schema: DictSchema<K, V> = {
    type: "dict",
    keysSchema,
    valuesSchema,
    ...(options.minLength === undefined
      ? {}
      : { minLength: options.minLength }),
    ...(options.maxLength === undefined
      ? {}
      : { maxLength: options.maxLength }),
  };
  return Object.freeze(schema);
}

/**
 * Short name of a schema, e.g. `dict[int,date]`
 */
export function schemaName(schema: Schema): string {
  if (schema.type === "dict") {
    return `dict[${schemaName(schema.keysSchema)},${schemaName(
      schema.valuesSchema
    )}]`;
  }
  return schema.type;
}
