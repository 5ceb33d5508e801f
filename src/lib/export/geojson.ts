import { featureCollection, point } from "@turf/helpers";
import type { MapsListData, PlaceFeature } from "../types";

/**
 * Point features for every place with coordinates. Places without coordinates are left out.
 */
export function buildGeoJson(list: MapsListData): GeoJSON.FeatureCollection<GeoJSON.Point> {
  const features: PlaceFeature[] = [];

  for (const p of list.places) {
    if (!p.coordinates) continue;
    features.push(
      point([p.coordinates.lon, p.coordinates.lat], {
        name: p.name,
        address: p.address,
        notes: p.notes,
      })
    );
  }

  return featureCollection(features);
}
