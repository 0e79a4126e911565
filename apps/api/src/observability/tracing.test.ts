import { describe, expect, it } from "vitest";
import { isUntracedPath, withSpan } from "./tracing";

describe("tracing", () => {
  it("skips health and metrics endpoints with or without a query string", () => {
    expect(isUntracedPath("/health")).toBe(true);
    expect(isUntracedPath("/metrics?format=text")).toBe(true);
    expect(isUntracedPath("/api/v1/applications")).toBe(false);
    expect(isUntracedPath(undefined)).toBe(false);
  });

  it("returns the wrapped result and rethrows failures without a started SDK", async () => {
    await expect(withSpan("test.ok", { attempt: 1 }, async () => "done")).resolves.toBe("done");
    await expect(
      withSpan("test.fail", {}, async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
  });
});
