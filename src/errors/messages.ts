export const ERROR_KINDS = [
  "string_type",
  "bool_parsing",
  "int_type",
  "int_parsing",
  "int_parsing_size",
  "int_from_float",
  "finite_number",
  "float_type",
  "float_parsing",
  "date_type",
  "date_parsing",
  "date_from_datetime_inexact",
  "datetime_type",
  "datetime_parsing",
  "dict_type",
  "too_short",
  "too_long",
  "json_invalid",
  "json_type",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export type ErrorContext = Readonly<Record<string, string | number>>;

const MESSAGE_TEMPLATES: Record<ErrorKind, string> = {
  string_type: "Input should be a valid string",
  bool_parsing: "Input should be a valid boolean, unable to interpret input",
  int_type: "Input should be a valid integer",
  int_parsing:
    "Input should be a valid integer, unable to parse string as an integer",
  int_parsing_size:
    "Unable to parse input string as an integer, exceeded maximum size",
  int_from_float:
    "Input should be a valid integer, got a number with a fractional part",
  finite_number: "Input should be a finite number",
  float_type: "Input should be a valid number",
  float_parsing:
    "Input should be a valid number, unable to parse string as a number",
  date_type: "Input should be a valid date",
  date_parsing: "Input should be a valid date in the format YYYY-MM-DD, {error}",
  date_from_datetime_inexact:
    "Datetimes provided to dates should have zero time - e.g. be exact dates",
  datetime_type: "Input should be a valid datetime",
  datetime_parsing: "Input should be a valid datetime, {error}",
  dict_type: "Input should be a valid dictionary",
  too_short:
    "{field_type} should have at least {min_length} item{expected_plural} after validation, not {actual_length}",
  too_long:
    "{field_type} should have at most {max_length} item{expected_plural} after validation, not {actual_length}",
  json_invalid: "Invalid JSON: {error}",
  json_type: "JSON input should be string, bytes or bytearray",
};

const PLACEHOLDER_REGEX = /\{(\w+)\}/g;

function pluralSuffix(context: ErrorContext): string {
  const bound = context.min_length ?? context.max_length;
  return bound === 1 ? "" : "s";
}

export function renderMessage(kind: ErrorKind, context?: ErrorContext): string {
  const ctx = context ?? {};
  return MESSAGE_TEMPLATES[kind].replace(
    PLACEHOLDER_REGEX,
    (placeholder, name: string) => {
      if (name === "expected_plural") {
        return pluralSuffix(ctx);
      }
      const value = ctx[name];
      return value === undefined ? placeholder : String(value);
    }
  );
}
