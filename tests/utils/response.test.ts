import { describe, it, expect } from "vitest";
import { errorPayload, statusFromError, successPayload } from "../../src/utils/response";

describe("response payloads", () => {
  it("wraps data and errors", () => {
    expect(successPayload({ kind: "CPF" })).toEqual({ success: true, data: { kind: "CPF" } });
    expect(errorPayload("Erro")).toEqual({ success: false, error: "Erro", description: "Erro" });
  });
});

describe("statusFromError", () => {
  it("keeps 4xx and 5xx codes", () => {
    expect(statusFromError({ statusCode: 429 })).toBe(429);
    expect(statusFromError({ statusCode: 503 })).toBe(503);
  });

  it("falls back to 500", () => {
    expect(statusFromError({})).toBe(500);
    expect(statusFromError({ statusCode: 302 })).toBe(500);
  });
});
