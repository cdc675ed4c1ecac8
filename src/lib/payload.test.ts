import { describe, expect, it } from "vitest";
import { decodeMorePayload, encodeMorePayload } from "./payload.js";

describe("load-more payload", () => {
  it("encodes the value as unpadded base64url", () => {
    expect(encodeMorePayload(42, 17, "a")).toBe("42|17|YQ");
    expect(encodeMorePayload(42, 17)).toBe("42|17|");
  });

  it("restores non-ASCII values", () => {
    expect(decodeMorePayload(encodeMorePayload(5, 9, "Шу Пуэр"))).toEqual({ userId: 5, cursor: 9, value: "Шу Пуэр" });
  });

  it("tolerates a missing value segment", () => {
    expect(decodeMorePayload("5|9")).toEqual({ userId: 5, cursor: 9, value: "" });
  });

  it("rejects malformed payloads", () => {
    expect(decodeMorePayload("5")).toBeNull();
    expect(decodeMorePayload("x|9|")).toBeNull();
    expect(decodeMorePayload("5|9|a+b")).toBeNull();
  });
});
