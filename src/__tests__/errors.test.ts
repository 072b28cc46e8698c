import { describe, it, expect } from "vitest";
import {
  ConcurrencyConflictError,
  ConfigurationError,
  MemoryError,
  TransientDependencyError,
  ValidationError,
  toError,
} from "../errors.js";

describe("errors", () => {
  it("ValidationError names the offending field", () => {
    const error = new ValidationError("must not be empty", "userId");

    expect(error).toBeInstanceOf(MemoryError);
    expect(error.code).toBe("VALIDATION_ERROR");
    expect(error.message).toBe('Invalid "userId": must not be empty');
    expect(error.name).toBe("ValidationError");
    expect(new ValidationError("bad turn").message).toBe("bad turn");
  });

  it("TransientDependencyError carries the last failure as its cause", () => {
    const cause = new Error("503");
    const error = new TransientDependencyError("summarizer", 3, cause);

    expect(error.message).toBe("summarizer failed after 3 attempts: 503");
    expect(error.cause).toBe(cause);
    expect(error.code).toBe("DEPENDENCY_UNAVAILABLE");
    expect(new TransientDependencyError("embedder", 1).message).toBe("embedder failed after 1 attempt");
  });

  it("ConcurrencyConflictError defaults its message", () => {
    const error = new ConcurrencyConflictError("u1::identity::name");
    expect(error.message).toBe("Concurrent write conflict on u1::identity::name");
    expect(error.code).toBe("CONCURRENCY_CONFLICT");
  });

  it("ConfigurationError joins its issues", () => {
    const error = new ConfigurationError(["a: bad", "b: worse"]);
    expect(error.message).toBe("Invalid memory configuration: a: bad; b: worse");
    expect(error.issues).toEqual(["a: bad", "b: worse"]);
  });

  it("toError wraps non-errors", () => {
    const original = new Error("x");
    expect(toError(original)).toBe(original);
    expect(toError("plain").message).toBe("plain");
    expect(toError(42).message).toBe("42");
  });
});
