import { describe, expect, it } from "vitest";

import { intSchema } from "../../core/schema";
import { validate, validateStrings } from "../../validator/validate";
import {
  errorTypes,
  expectFailure,
  expectSuccess,
  strict,
} from "../coerce-helpers";

const schema = intSchema();

describe("int coercion", () => {
  describe("from text", () => {
    it("parses signed decimal digits", () => {
      expect(expectSuccess(validate(schema, "42"))).toBe(42);
      expect(expectSuccess(validate(schema, "-17"))).toBe(-17);
      expect(expectSuccess(validate(schema, "+5", strict))).toBe(5);
    });

    it.each([" 1", "1\n", "1.0", "-7.000", "1_000"])(
      "rejects %j under both policies",
      (text) => {
        expect(errorTypes(validate(schema, text))).toEqual(["int_parsing"]);
        expect(errorTypes(validateStrings(schema, text))).toEqual([
          "int_parsing",
        ]);
        expect(errorTypes(validate(schema, text, strict))).toEqual([
          "int_parsing",
        ]);
      }
    );

    it("reports unparseable text", () => {
      expect(expectFailure(validate(schema, "xxx"))).toEqual([
        {
          type: "int_parsing",
          loc: [],
          msg: "Input should be a valid integer, unable to parse string as an integer",
          input: "xxx",
        },
      ]);
    });

    it("returns bigints beyond the safe range", () => {
      expect(expectSuccess(validate(schema, "9007199254740991"))).toBe(
        9_007_199_254_740_991
      );
      expect(expectSuccess(validate(schema, "9007199254740993"))).toBe(
        9_007_199_254_740_993n
      );
      expect(expectSuccess(validate(schema, "9223372036854775807"))).toBe(
        9_223_372_036_854_775_807n
      );
      expect(expectSuccess(validate(schema, "-9223372036854775808"))).toBe(
        -9_223_372_036_854_775_808n
      );
    });

    it("reports integers beyond 64 bits", () => {
      expect(expectFailure(validate(schema, "9223372036854775808"))).toEqual([
        {
          type: "int_parsing_size",
          loc: [],
          msg: "Unable to parse input string as an integer, exceeded maximum size",
          input: "9223372036854775808",
        },
      ]);
      expect(errorTypes(validate(schema, "99999999999999999999"))).toEqual([
        "int_parsing_size",
      ]);
    });

    it("normalizes negative zero", () => {
      expect(Object.is(expectSuccess(validate(schema, "-0")), 0)).toBe(true);
    });
  });

  describe("from numbers", () => {
    it("passes integral numbers through", () => {
      expect(expectSuccess(validate(schema, 12, strict))).toBe(12);
      expect(Object.is(expectSuccess(validate(schema, -0)), 0)).toBe(true);
    });

    it("rejects fractional numbers by policy", () => {
      expect(errorTypes(validate(schema, 1.5))).toEqual(["int_from_float"]);
      expect(errorTypes(validate(schema, 1.5, strict))).toEqual(["int_type"]);
    });

    it("rejects non-finite numbers", () => {
      expect(errorTypes(validate(schema, Number.POSITIVE_INFINITY))).toEqual([
        "finite_number",
      ]);
      expect(errorTypes(validate(schema, Number.NaN, strict))).toEqual([
        "finite_number",
      ]);
    });

    it("converts bigints within 64 bits", () => {
      expect(expectSuccess(validate(schema, 10n))).toBe(10);
      expect(expectSuccess(validate(schema, 2n ** 60n))).toBe(2n ** 60n);
      expect(errorTypes(validate(schema, 2n ** 63n))).toEqual([
        "int_parsing_size",
      ]);
    });

    it("returns unsafe integral numbers as bigints", () => {
      expect(expectSuccess(validate(schema, 2 ** 60))).toBe(2n ** 60n);
      expect(errorTypes(validate(schema, 2 ** 64))).toEqual([
        "int_parsing_size",
      ]);
    });
  });

  describe("from booleans", () => {
    it("maps to 1 and 0 under the lax policy", () => {
      expect(expectSuccess(validate(schema, true))).toBe(1);
      expect(expectSuccess(validate(schema, false))).toBe(0);
    });

    it("rejects them under the strict policy", () => {
      expect(errorTypes(validate(schema, true, strict))).toEqual(["int_type"]);
    });
  });
});
