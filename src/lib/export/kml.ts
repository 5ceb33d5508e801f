import { XMLBuilder } from "fast-xml-parser";
import type { MapsListData, MapsPlace } from "../types";
import { isBlank } from "../types";

export const KML_NAMESPACE = "http://www.opengis.net/kml/2.2";

type Placemark = {
  name: string;
  description?: { __cdata: string };
  Point?: { coordinates: string };
};

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  cdataPropName: "__cdata",
  // Unformatted, so a CDATA description is the only child of <description>.
  format: false,
  suppressEmptyNode: true,
});

/** Address and notes, separated by a blank line. */
export function placeDescription(place: MapsPlace): string | undefined {
  const parts = [place.address, place.notes].filter((p): p is string => !isBlank(p));
  return parts.length > 0 ? parts.join("\n\n") : undefined;
}

function toPlacemark(place: MapsPlace): Placemark {
  const pm: Placemark = { name: place.name };

  const description = placeDescription(place);
  // The builder splits any "]]>" inside the text across CDATA sections.
  if (description !== undefined) pm.description = { __cdata: description };

  if (place.coordinates) {
    // KML wants lon,lat[,alt]
    pm.Point = { coordinates: `${place.coordinates.lon},${place.coordinates.lat},0` };
  }
  return pm;
}

export function buildKml(list: MapsListData): string {
  const doc: Record<string, unknown> = { name: list.name };
  if (!isBlank(list.description)) doc.description = list.description;
  if (list.places.length > 0) doc.Placemark = list.places.map(toPlacemark);

  return builder.build({
    "?xml": { "@_version": "1.0", "@_encoding": "UTF-8" },
    kml: {
      "@_xmlns": KML_NAMESPACE,
      Document: doc,
    },
  });
}
