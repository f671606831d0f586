import { describe, expect, test } from "vitest";
import { LivenessError } from "../../src/errors";
import { findContig, isValidInterval, LivenessToken } from "../../src/reference/genome-reference";
import type { ContigInfo } from "../../src/types";

describe("findContig", () => {
  const contigs: ContigInfo[] = [
    { name: "chr1", altNames: ["1"] },
    { name: "1", description: "shadowed by the alias above" },
    { name: "chr2" },
    { name: "chr2", description: "duplicate" },
  ];

  test("prefers an exact name over an alias", () => {
    expect(findContig(contigs, "1")?.description).toBe("shadowed by the alias above");
  });

  test("falls back to alternative names", () => {
    expect(findContig([{ name: "chr1", altNames: ["1"] }], "1")?.name).toBe("chr1");
  });

  test("returns the first of duplicate entries", () => {
    expect(findContig(contigs, "chr2")?.description).toBeUndefined();
  });

  test("returns undefined for unknown names", () => {
    expect(findContig(contigs, "chrM")).toBeUndefined();
  });
});

describe("isValidInterval", () => {
  const bounded: ContigInfo = { name: "chr1", nBases: 100 };
  const unbounded: ContigInfo = { name: "chr2" };

  test("requires a contig", () => {
    expect(isValidInterval({ referenceName: "chr1", start: 0, end: 1 }, undefined)).toBe(false);
  });

  test("accepts non-inverted, non-negative integer ranges", () => {
    expect(isValidInterval({ referenceName: "chr1", start: 0, end: 100 }, bounded)).toBe(true);
    expect(isValidInterval({ referenceName: "chr1", start: 99, end: 99 }, bounded)).toBe(true);
    expect(isValidInterval({ referenceName: "chr2", start: 0, end: 1e9 }, unbounded)).toBe(true);
  });

  test("rejects negative, inverted and fractional ranges", () => {
    expect(isValidInterval({ referenceName: "chr1", start: -1, end: 5 }, bounded)).toBe(false);
    expect(isValidInterval({ referenceName: "chr1", start: 6, end: 5 }, bounded)).toBe(false);
    expect(isValidInterval({ referenceName: "chr1", start: 1.5, end: 5 }, bounded)).toBe(false);
  });

  test("rejects ranges outside a bounded contig", () => {
    expect(isValidInterval({ referenceName: "chr1", start: 0, end: 101 }, bounded)).toBe(false);
    expect(isValidInterval({ referenceName: "chr1", start: 100, end: 100 }, bounded)).toBe(false);
  });
});

describe("LivenessToken", () => {
  test("starts alive", () => {
    const token = new LivenessToken();
    expect(token.isAlive).toBe(true);
    expect(() => token.checkIsAlive()).not.toThrow();
  });

  test("fails checks once killed", () => {
    const token = new LivenessToken();
    token.kill();
    expect(token.isAlive).toBe(false);
    expect(() => token.checkIsAlive()).toThrow(LivenessError);
  });
});
