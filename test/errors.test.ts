import { describe, expect, test } from "vitest";
import {
  getErrorSuggestion,
  InvalidArgumentError,
  LivenessError,
  NotFoundError,
  RefCacheError,
} from "../src/errors";

describe("RefCacheError", () => {
  test("formats name and message", () => {
    const error = new InvalidArgumentError("Malformed region end: 2");
    expect(error.toString()).toBe("InvalidArgumentError: Malformed region end: 2");
  });

  test("appends context when present", () => {
    const error = new NotFoundError("Unknown reference_name 'chrZ'", "chrZ", "catalog has 2 contigs");
    expect(error.toString()).toBe(
      "NotFoundError: Unknown reference_name 'chrZ'\nContext: catalog has 2 contigs"
    );
  });

  test("carries a code per error class", () => {
    expect(new InvalidArgumentError("x").code).toBe("INVALID_ARGUMENT");
    expect(new NotFoundError("x", "chr1").code).toBe("NOT_FOUND");
    expect(new LivenessError("x").code).toBe("FAILED_PRECONDITION");
  });

  test("from() keeps library errors as they are", () => {
    const error = new LivenessError("Reference has been closed");
    expect(RefCacheError.from(error)).toBe(error);
  });

  test("from() wraps anything else", () => {
    const wrapped = RefCacheError.from(new TypeError("boom"));
    expect(wrapped).toBeInstanceOf(RefCacheError);
    expect(wrapped.code).toBe("UNKNOWN");
    expect(wrapped.message).toBe("boom");
    expect(RefCacheError.from("plain").message).toBe("plain");
  });
});

describe("getErrorSuggestion", () => {
  test("maps codes to hints", () => {
    expect(getErrorSuggestion(new NotFoundError("x", "chr1"))).toBe(
      "Check the contig catalog for the reference name"
    );
    expect(getErrorSuggestion(RefCacheError.from("plain"))).toBeUndefined();
  });
});
