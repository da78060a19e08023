import { describe, it, expect } from "vitest";
import { normalizeJsonObject, unwrapParams } from "@/shared/json/jsonBoundary";

describe("normalizeJsonObject", () => {
  it("accepts plain objects only", () => {
    expect(normalizeJsonObject({ a: 1 })).toEqual({ a: 1 });
    expect(normalizeJsonObject([1])).toBeUndefined();
    expect(normalizeJsonObject(null)).toBeUndefined();
    expect(normalizeJsonObject("x")).toBeUndefined();
  });
});

describe("unwrapParams", () => {
  it("lifts the wrapped attributes over top-level keys", () => {
    expect(
      unwrapParams(
        { programmer: { name: "Ada" }, name: "ignored", authenticity_token: "t" },
        "programmer",
      ),
    ).toEqual({ name: "Ada", authenticity_token: "t" });
  });

  it("returns flat bodies unchanged", () => {
    expect(unwrapParams({ name: "Ada" }, "programmer")).toEqual({
      name: "Ada",
    });
  });

  it("treats non-object bodies and wrappers as absent", () => {
    expect(unwrapParams(undefined, "programmer")).toEqual({});
    expect(unwrapParams({ programmer: "Ada" }, "programmer")).toEqual({
      programmer: "Ada",
    });
  });
});
