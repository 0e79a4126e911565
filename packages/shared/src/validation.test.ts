import { describe, expect, it } from "vitest";
import {
  normalizeKenyanPhone,
  validateEmail,
  validateKenyanPhone,
  validateNationalId,
} from "./validation";

describe("normalizeKenyanPhone", () => {
  it("converts a local number with spaces and dashes", () => {
    expect(normalizeKenyanPhone("0712 345-678")).toBe("+254712345678");
  });

  it("adds the plus sign to a 254-prefixed number", () => {
    expect(normalizeKenyanPhone("254712345678")).toBe("+254712345678");
  });

  it("leaves an international number unchanged", () => {
    expect(normalizeKenyanPhone("+254112345678")).toBe("+254112345678");
  });

  it("prepends the country code to a bare subscriber number", () => {
    expect(normalizeKenyanPhone("712345678")).toBe("+254712345678");
  });
});

describe("field validators", () => {
  it("accepts Safaricom and 01xx numbers", () => {
    expect(validateKenyanPhone("0712345678")).toBeNull();
    expect(validateKenyanPhone("0110345678")).toBeNull();
  });

  it("rejects numbers of the wrong length or with letters", () => {
    expect(validateKenyanPhone("07123")).toBe("validation.phone");
    expect(validateKenyanPhone("07123abc78")).toBe("validation.phone");
  });

  it("validates national ID numbers by digit count", () => {
    expect(validateNationalId("12345678")).toBeNull();
    expect(validateNationalId("12345")).toBe("validation.national_id");
    expect(validateNationalId("12A45678")).toBe("validation.national_id");
  });

  it("flags emails without a domain", () => {
    expect(validateEmail("jane@")).toBe("validation.email");
    expect(validateEmail("jane@example.com")).toBeNull();
  });
});
