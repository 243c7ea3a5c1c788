import { describe, expect, it } from "vitest";
import { ERROR_CATALOG } from "../../index.js";

const entries = Object.entries(ERROR_CATALOG);

describe("ERROR_CATALOG", () => {
  it("should have all expected domains", () => {
    const domains = new Set(Object.values(ERROR_CATALOG).map((e) => e.domain));

    expect([...domains].sort()).toEqual(["command-policy", "internal", "session"]);
  });

  it("should use UPPER_SNAKE_CASE codes", () => {
    for (const [code] of entries) {
      expect(code).toMatch(/^[A-Z][A-Z0-9_]*$/);
    }
  });

  it("should map every code to a valid HTTP status", () => {
    for (const [, entry] of entries) {
      expect(entry.httpStatus).toBeGreaterThanOrEqual(100);
      expect(entry.httpStatus).toBeLessThan(600);
    }
  });

  it("should map expected errors to client statuses", () => {
    const misplaced = entries
      .filter(([, entry]) => entry.isExpected && entry.httpStatus >= 500)
      .map(([code]) => code);

    expect(misplaced).toEqual([]);
  });

  it("should map every code to a valid gRPC code", () => {
    const validGrpcCodes = [
      "INVALID_ARGUMENT",
      "PERMISSION_DENIED",
      "FAILED_PRECONDITION",
      "INTERNAL",
    ];
    for (const entry of Object.values(ERROR_CATALOG)) {
      expect(validGrpcCodes).toContain(entry.grpcCode);
    }
  });

  it("should group the session codes", () => {
    const sessionCodes = entries.filter(([, e]) => e.domain === "session").map(([code]) => code);

    expect(sessionCodes).toEqual(["SESSION_ID_REQUIRED", "SESSION_APPROVAL_INVALID"]);
  });
});
