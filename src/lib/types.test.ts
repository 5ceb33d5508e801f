import { describe, expect, it } from "vitest";
import { ListExtractionError } from "./errors";
import { createListData, isBlank } from "./types";
import type { MapsPlace } from "./types";

describe("createListData", () => {
  it("rejects an empty or whitespace name", () => {
    for (const name of ["", " \t\n"]) {
      expect(() => createListData({ name }, [])).toThrow(ListExtractionError);
      expect(() => createListData({ name }, [])).toThrow("Unable to determine the list name.");
    }
  });

  it("copies the places it is given", () => {
    const places: MapsPlace[] = [{ name: "A" }];
    const data = createListData({ name: "L", creator: "Jane" }, places);
    places.push({ name: "B" });

    expect(data).toEqual({ name: "L", creator: "Jane", places: [{ name: "A" }] });
  });
});

describe("isBlank", () => {
  it("treats undefined, null and whitespace as blank", () => {
    expect(isBlank(undefined)).toBe(true);
    expect(isBlank(null)).toBe(true);
    expect(isBlank("  ")).toBe(true);
    expect(isBlank(" x ")).toBe(false);
  });
});
