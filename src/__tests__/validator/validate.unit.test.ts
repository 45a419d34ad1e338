import { describe, expect, it, vi } from "vitest";

import {
  boolSchema,
  dateSchema,
  datetimeSchema,
  dictSchema,
  floatSchema,
  intSchema,
} from "../../core/schema";
import { CalendarDate } from "../../core/values";
import { ValidationError } from "../../errors/types";
import {
  validate,
  validateOrThrow,
  validateStrings,
} from "../../validator/validate";
import {
  errorTypes,
  expectFailure,
  expectSuccess,
  strict,
} from "../coerce-helpers";

describe("validateStrings", () => {
  it("coerces text under each scalar schema", () => {
    expect(expectSuccess(validateStrings(floatSchema(), "1.10"))).toBe(1.1);
    expect(expectSuccess(validateStrings(intSchema(), "42"))).toBe(42);
    expect(
      expectSuccess(validateStrings(dateSchema(), "2017-01-01")).toString()
    ).toBe("2017-01-01");
    expect(
      expectSuccess(
        validateStrings(datetimeSchema(), "2017-01-01T12:13:14.567")
      ).microsecond
    ).toBe(567_000);
  });

  it("narrows midnight datetimes to dates under the lax policy", () => {
    expect(
      expectSuccess(
        validateStrings(dateSchema(), "2017-01-01T00:00:00")
      ).toString()
    ).toBe("2017-01-01");
    expect(
      errorTypes(validateStrings(dateSchema(), "2017-01-01T00:00:00", strict))
    ).toEqual(["date_parsing"]);
  });

  it("distinguishes inexact datetimes by policy", () => {
    expect(
      errorTypes(validateStrings(dateSchema(), "2017-01-01T12:13:14.567"))
    ).toEqual(["date_from_datetime_inexact"]);
    expect(
      errorTypes(
        validateStrings(dateSchema(), "2017-01-01T12:13:14.567", strict)
      )
    ).toEqual(["date_parsing"]);
  });

  it("coerces a dict of text", () => {
    const value = expectSuccess(
      validateStrings(dictSchema(intSchema(), dateSchema()), {
        "1": "2017-01-01",
        "2": "2017-01-02",
      })
    );
    expect([...value.entries()]).toEqual([
      [1, new CalendarDate(2017, 1, 1)],
      [2, new CalendarDate(2017, 1, 2)],
    ]);
  });

  it("reports text that no coercer accepts", () => {
    expect(expectFailure(validateStrings(intSchema(), "xxx"))).toEqual([
      {
        type: "int_parsing",
        loc: [],
        msg: "Input should be a valid integer, unable to parse string as an integer",
        input: "xxx",
      },
    ]);
  });
});

describe("validate", () => {
  it("does not call onError on clean input", () => {
    const onError = vi.fn();
    expectSuccess(validate(dateSchema(), "2017-01-01", { onError }));
    expect(onError).not.toHaveBeenCalled();
  });

  it("returns the same value when fed its own output", () => {
    const schema = dictSchema(
      intSchema(),
      dictSchema(dateSchema(), boolSchema())
    );
    const first = expectSuccess(
      validate(schema, { "1": { "2017-01-01": "yes" }, "2": {} })
    );
    const second = expectSuccess(validate(schema, first, strict));
    expect(second).toEqual(first);
  });

  it("keeps each call's policy independent", () => {
    expect(errorTypes(validate(boolSchema(), "yes", strict))).toEqual([
      "string_type",
    ]);
    expect(expectSuccess(validate(boolSchema(), "yes"))).toBe(true);
  });
});

describe("validateOrThrow", () => {
  it("returns the coerced value", () => {
    expect(validateOrThrow(intSchema(), "7")).toBe(7);
  });

  it("throws a ValidationError", () => {
    const run = () => validateOrThrow(intSchema(), "seven", { title: "count" });
    expect(run).toThrow(ValidationError);
    expect(run).toThrow("1 validation error for count");
  });
});
