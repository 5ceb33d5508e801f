import { XMLParser } from "fast-xml-parser";
import { describe, expect, it } from "vitest";
import type { MapsListData } from "../types";
import { buildKml, KML_NAMESPACE, placeDescription } from "./kml";

const LIST: MapsListData = {
  name: "My List",
  description: "A description",
  creator: "Jane",
  places: [
    { name: "Cafe", address: "123 Main St", notes: "Nice coffee", coordinates: { lat: 40.1, lon: -3.7 } },
    { name: "Fish & Chips" },
  ],
};

// Text and CDATA leaves of a parsed node, in document order.
function textOf(node: unknown): string {
  if (typeof node === "string") return node;
  if (Array.isArray(node)) return node.map(textOf).join("");
  if (node !== null && typeof node === "object") return Object.values(node).map(textOf).join("");
  return "";
}

describe("buildKml", () => {
  const kml = buildKml(LIST);

  it("writes a KML 2.2 document", () => {
    expect(kml.startsWith('<?xml version="1.0" encoding="UTF-8"?>')).toBe(true);
    expect(kml).toContain(`<kml xmlns="${KML_NAMESPACE}">`);
    expect(kml).toContain("<name>My List</name>");
    expect(kml).toContain("<description>A description</description>");
  });

  it("writes points as lon,lat,0 and CDATA descriptions", () => {
    expect(kml).toContain("<coordinates>-3.7,40.1,0</coordinates>");
    expect(kml).toContain("<description><![CDATA[123 Main St\n\nNice coffee]]></description>");
  });

  it("keeps description text unchanged through CDATA", () => {
    const out = buildKml({ name: "L", places: [{ name: "P", address: " 1 Road ", notes: "x ]]> y" }] });
    const parsed = new XMLParser({ trimValues: false, cdataPropName: "__cdata" }).parse(out);

    expect(textOf(parsed.kml.Document.Placemark.description)).toBe(" 1 Road \n\nx ]]> y");
  });

  it("escapes text", () => {
    expect(kml).toContain("<name>Fish &amp; Chips</name>");
  });

  it("parses back into one placemark per place", () => {
    const parsed = new XMLParser({ ignoreAttributes: false, attributeNamePrefix: "@_" }).parse(kml);
    const doc = parsed.kml.Document;

    expect(parsed.kml["@_xmlns"]).toBe(KML_NAMESPACE);
    expect(doc.Placemark).toHaveLength(2);
    expect(doc.Placemark[0].Point.coordinates).toBe("-3.7,40.1,0");
    expect(doc.Placemark[1].name).toBe("Fish & Chips");
    expect(doc.Placemark[1].Point).toBeUndefined();
    expect(doc.Placemark[1].description).toBeUndefined();
  });

  it("omits the list description when blank", () => {
    const out = buildKml({ name: "Empty", description: "  ", places: [] });
    expect(out).not.toContain("<description>");
    expect(out).not.toContain("<Placemark>");
  });
});

describe("placeDescription", () => {
  it("joins address and notes with a blank line", () => {
    expect(placeDescription({ name: "x", address: "A", notes: "N" })).toBe("A\n\nN");
    expect(placeDescription({ name: "x", notes: "N" })).toBe("N");
    expect(placeDescription({ name: "x", address: " " })).toBeUndefined();
  });
});
