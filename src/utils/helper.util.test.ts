import { describe, expect, it } from "vitest";
import { compareRecordIds, sanitizeFilename } from "./helper.util";

describe("compareRecordIds", () => {
  it("orders numeric ids by value", () => {
    expect(["10", "9", "100", "011"].sort(compareRecordIds)).toEqual(["9", "10", "011", "100"]);
  });

  it("orders ids beyond the safe integer range", () => {
    expect(["90071992547409930", "90071992547409929"].sort(compareRecordIds)).toEqual([
      "90071992547409929",
      "90071992547409930",
    ]);
  });

  it("puts numeric ids before keys and orders keys lexically", () => {
    expect(["ff01", "3", "a0b1", "12"].sort(compareRecordIds)).toEqual(["3", "12", "a0b1", "ff01"]);
  });
});

describe("sanitizeFilename", () => {
  it("replaces separators and control characters", () => {
    expect(sanitizeFilename("../etc/passwd", "7")).toBe(".._etc_passwd");
    expect(sanitizeFilename("a\\b\u0001c.txt", "7")).toBe("a_b_c.txt");
  });

  it("uses the fallback for names that cannot stand alone", () => {
    expect(sanitizeFilename("", "7")).toBe("7");
    expect(sanitizeFilename(" .. ", "7")).toBe("7");
    expect(sanitizeFilename(".", "7")).toBe("7");
  });

  it("keeps ordinary names", () => {
    expect(sanitizeFilename("diagram v2.png", "7")).toBe("diagram v2.png");
  });
});
