import type { ValidationState } from "../core/types";
import type { CalendarDate, DateTimeValue } from "../core/values";
import { canonicalText, type InputValue, inputRaw } from "../input/canonical";
import {
  parseDate,
  parseDateTime,
  timestampToDateTime,
} from "../temporal/parse";
import { toDateTimeValue } from "./datetime";
import {
  type CoerceResult,
  type Coercer,
  failure,
  failWith,
  isStrict,
  success,
} from "./shared";

/**
 * Narrows a datetime to its date when the time of day is exactly midnight.
 * Any UTC offset is dropped.
 */
function dateFromDatetime(
  datetime: DateTimeValue,
  input: InputValue,
  state: ValidationState
): CoerceResult<CalendarDate> {
  if (!datetime.isMidnight()) {
    return failure("date_from_datetime_inexact", input);
  }
  state.onError?.("Truncated datetime to date", { input: inputRaw(input) });
  return success(datetime.date());
}

export const coerceDate: Coercer<CalendarDate> = (input, state) => {
  const strict = isStrict(state);
  switch (input.kind) {
    case "date":
      return success(input.value);
    case "datetime":
      return strict
        ? failure("date_type", input)
        : dateFromDatetime(toDateTimeValue(input.value), input, state);
    case "number": {
      if (strict) {
        return failure("date_type", input);
      }
      const parsed = timestampToDateTime(input.value);
      return parsed.ok
        ? dateFromDatetime(parsed.value, input, state)
        : failure("date_parsing", input, { error: parsed.reason });
    }
    case "boolean":
    case "bigint":
      return failure("date_type", input);
    default:
      break;
  }

  const canonical = canonicalText(input);
  if (!canonical.ok) {
    return failWith(canonical.error);
  }
  const date = parseDate(canonical.text);
  if (date.ok) {
    return success(date.value);
  }
  // strict mode never tries the datetime narrowing path
  if (strict) {
    return failure("date_parsing", input, { error: date.reason });
  }
  const datetime = parseDateTime(canonical.text);
  if (!datetime.ok) {
    return failure("date_parsing", input, { error: date.reason });
  }
  return dateFromDatetime(datetime.value, input, state);
};
