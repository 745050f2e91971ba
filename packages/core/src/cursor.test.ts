import { describe, it, expect } from "vitest";
import { BadParamInput } from "@clean-articles/errors";
import { decodeCursor, encodeCursor } from "./cursor.js";

describe("cursor", () => {
  it("encodes the ISO instant as base64", () => {
    const createdAt = new Date("2024-02-03T04:05:06.789Z");
    const cursor = encodeCursor(createdAt);

    expect(Buffer.from(cursor, "base64").toString("utf-8")).toBe("2024-02-03T04:05:06.789Z");
    expect(decodeCursor(cursor)).toEqual(createdAt);
  });

  it("starts at the epoch for an empty cursor", () => {
    expect(decodeCursor("")).toEqual(new Date(0));
  });

  it("raises BadParamInput for garbage", () => {
    expect(() => decodeCursor("%%%")).toThrow(BadParamInput);
  });
});
