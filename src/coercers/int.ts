import { canonicalText, type InputValue } from "../input/canonical";
import {
  type CoerceResult,
  type Coercer,
  failure,
  failWith,
  isStrict,
  success,
} from "./shared";

const INT_TEXT_REGEX = /^[+-]?\d+$/;

const I64_MAX = 2n ** 63n - 1n;
const I64_MIN = -(2n ** 63n);

export type IntValue = number | bigint;

/**
 * Safe integers come back as `number`; the rest of the signed 64-bit range
 * as `bigint`.
 */
function intFromBigInt(
  value: bigint,
  input: InputValue
): CoerceResult<IntValue> {
  if (value > I64_MAX || value < I64_MIN) {
    return failure("int_parsing_size", input);
  }
  const asNumber = Number(value);
  return success(Number.isSafeInteger(asNumber) ? asNumber : value);
}

function intFromText(text: string, input: InputValue): CoerceResult<IntValue> {
  if (!INT_TEXT_REGEX.test(text)) {
    return failure("int_parsing", input);
  }
  const digits = text.startsWith("+") ? text.slice(1) : text;
  return intFromBigInt(BigInt(digits), input);
}

function intFromNumber(
  value: number,
  input: InputValue,
  strict: boolean
): CoerceResult<IntValue> {
  if (!Number.isFinite(value)) {
    return failure("finite_number", input);
  }
  if (!Number.isInteger(value)) {
    return failure(strict ? "int_type" : "int_from_float", input);
  }
  // -0 normalizes to 0
  return intFromBigInt(BigInt(value), input);
}

export const coerceInt: Coercer<IntValue> = (input, state) => {
  const strict = isStrict(state);
  switch (input.kind) {
    case "number":
      return intFromNumber(input.value, input, strict);
    case "bigint":
      return intFromBigInt(input.value, input);
    case "boolean":
      return strict ? failure("int_type", input) : success(input.value ? 1 : 0);
    default:
      break;
  }
  const canonical = canonicalText(input);
  if (!canonical.ok) {
    return failWith(canonical.error);
  }
  // text reads the same under both policies
  return intFromText(canonical.text, input);
};
