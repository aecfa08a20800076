import { describe, expect, it } from "vitest";
import {
  DimensionMismatchError,
  DuplicateIdentityError,
  ExtractionFailedError,
  FaceKeepError,
  InsufficientSamplesError,
  InvalidValueError,
  MalformedRecordError,
  UnknownIdentityError,
  httpStatusFor,
} from "./errors.js";

describe("FaceKeep errors", () => {
  it("carry a stable code and name", () => {
    const error = new DimensionMismatchError(128, 64);

    expect(error).toBeInstanceOf(FaceKeepError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe("DIMENSION_MISMATCH");
    expect(error.name).toBe("DimensionMismatchError");
    expect(error.message).toBe("Dimension mismatch: expected 128, got 64");
  });

  it("keep the cause of an extraction failure", () => {
    const cause = new Error("unreadable image");
    expect(new ExtractionFailedError("No face found", { cause }).cause).toBe(cause);
  });
});

describe("httpStatusFor", () => {
  it.each([
    [new DimensionMismatchError(3, 2), 400],
    [new InvalidValueError("bad"), 400],
    [new MalformedRecordError("registry.json", "bad"), 400],
    [new DuplicateIdentityError("alice"), 409],
    [new UnknownIdentityError("alice"), 404],
    [new InsufficientSamplesError(0, 1, 1), 422],
    [new ExtractionFailedError("no face"), 422],
    [new Error("boom"), 500],
    ["not an error", 500],
  ])("maps %s to %i", (error, status) => {
    expect(httpStatusFor(error)).toBe(status);
  });
});
