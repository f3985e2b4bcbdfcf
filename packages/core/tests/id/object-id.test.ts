import { describe, expect, it } from "vitest";

import { EMPTY_TREE_ID, isZeroId, shortId, ZERO_OBJECT_ID } from "../../src/index.js";

describe("object ids", () => {
  it("should recognize zero ids of any length", () => {
    expect(isZeroId(ZERO_OBJECT_ID)).toBe(true);
    expect(isZeroId("0000000")).toBe(true);
    expect(isZeroId("")).toBe(true);
    expect(isZeroId(EMPTY_TREE_ID)).toBe(false);
    expect(isZeroId("000000a")).toBe(false);
  });

  it("should shorten ids for display", () => {
    expect(shortId(EMPTY_TREE_ID)).toBe("4b825dc");
    expect(shortId("abc")).toBe("abc");
  });
});
