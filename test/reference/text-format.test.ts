import { describe, expect, test } from "vitest";
import { formatRange } from "../../src/reference/text-format";

describe("formatRange", () => {
  test("renders every non-default field in order", () => {
    expect(formatRange({ referenceName: "chr1", start: 1, end: 3 })).toBe(
      'reference_name: "chr1" start: 1 end: 3'
    );
  });

  test("omits a zero start", () => {
    expect(formatRange({ referenceName: "chr1", start: 0, end: 4 })).toBe(
      'reference_name: "chr1" end: 4'
    );
  });

  test("omits an empty reference name", () => {
    expect(formatRange({ referenceName: "", start: 2, end: 5 })).toBe("start: 2 end: 5");
  });

  test("renders an all-default range as an empty string", () => {
    expect(formatRange({ referenceName: "", start: 0, end: 0 })).toBe("");
  });

  test("keeps negative coordinates", () => {
    expect(formatRange({ referenceName: "chrX", start: -1, end: -5 })).toBe(
      'reference_name: "chrX" start: -1 end: -5'
    );
  });

  test("escapes quotes, backslashes and control characters in names", () => {
    expect(formatRange({ referenceName: 'a"b\\c\td', start: 1, end: 2 })).toBe(
      'reference_name: "a\\"b\\\\c\\td" start: 1 end: 2'
    );
  });

  test("writes other control characters as octal escapes", () => {
    expect(formatRange({ referenceName: "a\u0001b\u007f", start: 0, end: 1 })).toBe(
      'reference_name: "a\\001b\\177" end: 1'
    );
  });

  test("keeps non-ASCII characters as they are", () => {
    expect(formatRange({ referenceName: "contig\u00e9", start: 0, end: 1 })).toBe(
      'reference_name: "contig\u00e9" end: 1'
    );
  });
});
