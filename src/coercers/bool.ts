import { canonicalText } from "../input/canonical";
import {
  type Coercer,
  failure,
  failWith,
  isStrict,
  success,
} from "./shared";

/**
 * Lax text literals, matched case-insensitively and without trimming
 */
export const TRUE_LITERALS: readonly string[] = [
  "true",
  "t",
  "yes",
  "y",
  "on",
  "1",
];
export const FALSE_LITERALS: readonly string[] = [
  "false",
  "f",
  "no",
  "n",
  "off",
  "0",
];

export function boolFromLiteral(text: string): boolean | undefined {
  const lower = text.toLowerCase();
  if (TRUE_LITERALS.includes(lower)) {
    return true;
  }
  if (FALSE_LITERALS.includes(lower)) {
    return false;
  }
  return;
}

export const coerceBool: Coercer<boolean> = (input, state) => {
  if (input.kind === "boolean") {
    return success(input.value);
  }
  // strict mode only takes native booleans; nothing is canonicalised
  if (isStrict(state)) {
    return failure("string_type", input);
  }
  switch (input.kind) {
    case "number":
    case "bigint": {
      const numeric = Number(input.value);
      if (numeric === 0 || numeric === 1) {
        return success(numeric === 1);
      }
      return failure("bool_parsing", input);
    }
    default:
      break;
  }
  const canonical = canonicalText(input);
  if (!canonical.ok) {
    return failWith(canonical.error);
  }
  const value = boolFromLiteral(canonical.text);
  return value === undefined
    ? failure("bool_parsing", input)
    : success(value);
};
