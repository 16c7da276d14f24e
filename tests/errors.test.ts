import { describe, it, expect } from "vitest";
import {
  AppError,
  CapacityExceededError,
  DuplicateNameError,
  NotFoundError,
  StorageError,
  sanitizeError,
} from "../src/errors.js";

describe("errors", () => {
  it("carries a machine code and a readable message", () => {
    const err = new NotFoundError("project", 5);
    expect(err).toBeInstanceOf(AppError);
    expect(err.code).toBe("not_found");
    expect(err.name).toBe("NotFoundError");
    expect(err.message).toBe("Project 5 not found.");
  });

  it("words capacity errors per entity", () => {
    expect(new CapacityExceededError("project", 10).message).toBe(
      "Cannot create more than 10 projects.",
    );
    expect(new CapacityExceededError("task", 1).message).toBe(
      "Cannot create more than 1 task per project.",
    );
  });

  it("keeps the original error as the cause of a storage error", () => {
    const cause = new Error("disk I/O error");
    const err = new StorageError("insert task", cause);
    expect(err.cause).toBe(cause);
    expect(err.message).toBe("Storage operation failed: insert task.");
  });
});

describe("sanitizeError", () => {
  it("passes domain messages through", () => {
    expect(sanitizeError(new DuplicateNameError("Alpha"))).toBe(
      "A project named 'Alpha' already exists.",
    );
  });

  it("hides storage and unknown errors", () => {
    const generic = "An internal error occurred. Please try again.";
    expect(sanitizeError(new StorageError("list tasks", new Error("SQLITE_BUSY")))).toBe(generic);
    expect(sanitizeError(new TypeError("x is undefined"))).toBe(generic);
    expect(sanitizeError("boom")).toBe(generic);
  });
});
