import { DateTimeValue } from "../core/values";
import { canonicalText } from "../input/canonical";
import { parseDateTime, timestampToDateTime } from "../temporal/parse";
import {
  type Coercer,
  failure,
  failWith,
  isStrict,
  success,
} from "./shared";

export function toDateTimeValue(value: DateTimeValue | Date): DateTimeValue {
  return value instanceof DateTimeValue ? value : DateTimeValue.fromDate(value);
}

export const coerceDatetime: Coercer<DateTimeValue> = (input, state) => {
  const strict = isStrict(state);
  switch (input.kind) {
    case "datetime":
      return success(toDateTimeValue(input.value));
    case "date": {
      if (strict) {
        return failure("datetime_type", input);
      }
      const { year, month, day } = input.value;
      return success(new DateTimeValue({ year, month, day }));
    }
    case "number": {
      if (strict) {
        return failure("datetime_type", input);
      }
      const parsed = timestampToDateTime(input.value);
      return parsed.ok
        ? success(parsed.value)
        : failure("datetime_parsing", input, { error: parsed.reason });
    }
    case "boolean":
    case "bigint":
      return failure("datetime_type", input);
    default:
      break;
  }
  const canonical = canonicalText(input);
  if (!canonical.ok) {
    return failWith(canonical.error);
  }
  // a bare date is only promoted to midnight under the lax policy
  const parsed = parseDateTime(canonical.text, { allowDateOnly: !strict });
  return parsed.ok
    ? success(parsed.value)
    : failure("datetime_parsing", input, { error: parsed.reason });
};
