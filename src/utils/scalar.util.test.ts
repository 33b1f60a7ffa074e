import { describe, expect, it } from "vitest";
import {
  coerceScalar,
  decodeStructuredValue,
  parseExportDate,
  parseInteger,
  scalarToInteger,
  scalarToString,
  scalarToTimestamp,
} from "./scalar.util";

describe("parseExportDate", () => {
  it("reads the export format as UTC", () => {
    expect(parseExportDate("2021-03-18 14:21:51.000")?.toISOString()).toBe("2021-03-18T14:21:51.000Z");
  });

  it("pads short fractions to milliseconds", () => {
    expect(parseExportDate("2021-03-18 14:21:51.5")?.toISOString()).toBe("2021-03-18T14:21:51.500Z");
  });

  it("accepts a T separator and no fraction", () => {
    expect(parseExportDate("2020-01-02T03:04:05")?.toISOString()).toBe("2020-01-02T03:04:05.000Z");
  });

  it("rejects other shapes", () => {
    expect(parseExportDate("18/03/2021")).toBeNull();
    expect(parseExportDate("")).toBeNull();
  });
});

describe("parseInteger", () => {
  it("parses signed integers", () => {
    expect(parseInteger(" 42 ")).toBe(42);
    expect(parseInteger("-7")).toBe(-7);
  });

  it("refuses decimals and unsafe magnitudes", () => {
    expect(parseInteger("4.2")).toBeNull();
    expect(parseInteger("99999999999999999999")).toBeNull();
  });
});

describe("coerceScalar", () => {
  it("keeps untagged text raw", () => {
    expect(coerceScalar("12")).toBe("12");
    expect(coerceScalar("true")).toBe("true");
  });

  it("coerces by tag, case-insensitively", () => {
    expect(coerceScalar("12", "Long")).toBe(12);
    expect(coerceScalar("FALSE", "boolean")).toBe(false);
    expect(coerceScalar("2022-12-31 23:59:59", "java.sql.Timestamp")).toEqual(
      new Date("2022-12-31T23:59:59.000Z"),
    );
  });

  it("falls back to the raw text when a tagged value does not parse", () => {
    expect(coerceScalar("soon", "date")).toBe("soon");
    expect(coerceScalar("many", "int")).toBe("many");
    expect(coerceScalar("yes", "boolean")).toBe("yes");
  });

  it("maps missing text to null", () => {
    expect(coerceScalar(null, "int")).toBeNull();
  });
});

describe("scalar conversions", () => {
  it("renders dates as ISO strings", () => {
    const date = new Date("2021-01-01T00:00:00.000Z");
    expect(scalarToString(date)).toBe("2021-01-01T00:00:00.000Z");
    expect(scalarToString(3)).toBe("3");
    expect(scalarToString(undefined)).toBeNull();
  });

  it("reads integers from numbers and numeric strings", () => {
    expect(scalarToInteger(5)).toBe(5);
    expect(scalarToInteger("6")).toBe(6);
    expect(scalarToInteger(true)).toBeNull();
  });

  it("reads timestamps from dates and export strings", () => {
    expect(scalarToTimestamp("2021-03-18 14:21:51.000")).toBe("2021-03-18T14:21:51.000Z");
    expect(scalarToTimestamp("not a date")).toBeNull();
    expect(scalarToTimestamp(10)).toBeNull();
  });
});

describe("decodeStructuredValue", () => {
  it("parses JSON objects and arrays", () => {
    expect(decodeStructuredValue('{"width":200,"tags":["a"]}')).toEqual({ width: 200, tags: ["a"] });
    expect(decodeStructuredValue("[1,2]")).toEqual([1, 2]);
  });

  it("keeps plain and broken text as it is", () => {
    expect(decodeStructuredValue("draft")).toBe("draft");
    expect(decodeStructuredValue("{not json")).toBe("{not json");
    expect(decodeStructuredValue("42")).toBe("42");
  });
});
