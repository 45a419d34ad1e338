import { canonicalText } from "../input/canonical";
import {
  type Coercer,
  failure,
  failWith,
  isStrict,
  laxTrim,
  success,
} from "./shared";

const DECIMAL_REGEX = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL_FLOAT_REGEX = /^([+-]?)(inf|infinity|nan)$/i;

export function parseFloatLiteral(text: string): number | undefined {
  if (DECIMAL_REGEX.test(text)) {
    return Number(text);
  }
  const special = SPECIAL_FLOAT_REGEX.exec(text);
  if (!special) {
    return;
  }
  const [, sign, word] = special;
  if (word?.toLowerCase() === "nan") {
    return Number.NaN;
  }
  return sign === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
}

export const coerceFloat: Coercer<number> = (input, state) => {
  const strict = isStrict(state);
  switch (input.kind) {
    case "number":
      return success(input.value);
    case "bigint":
      return success(Number(input.value));
    case "boolean":
      return strict
        ? failure("float_type", input)
        : success(input.value ? 1 : 0);
    default:
      break;
  }
  const canonical = canonicalText(input);
  if (!canonical.ok) {
    return failWith(canonical.error);
  }
  const value = parseFloatLiteral(
    strict ? canonical.text : laxTrim(canonical.text)
  );
  return value === undefined
    ? failure("float_parsing", input)
    : success(value);
};
