import { ListExtractionError } from "./errors";

export type LatLon = {
  lat: number;
  lon: number;
};

export type MapsPlace = {
  name: string;
  address?: string;
  notes?: string;
  // Both or neither: a place never carries half a coordinate.
  coordinates?: LatLon;
};

export type ListMetadata = {
  name: string;
  description?: string;
  creator?: string;
  shareUrl?: string;
};

/** A decoded list: metadata plus its places in source order. */
export type MapsListData = ListMetadata & {
  places: readonly MapsPlace[];
};

export type PlaceFeature = GeoJSON.Feature<GeoJSON.Point, Omit<MapsPlace, "coordinates">>;

export function isBlank(s: string | undefined | null): boolean {
  return s == null || s.trim() === "";
}

/**
 * Build list data, rejecting a blank name instead of defaulting it.
 */
export function createListData(meta: ListMetadata, places: readonly MapsPlace[]): MapsListData {
  if (isBlank(meta.name)) {
    throw new ListExtractionError("RequiredFieldMissing", "Unable to determine the list name.");
  }

  const out: MapsListData = { name: meta.name, places: [...places] };
  if (meta.description !== undefined) out.description = meta.description;
  if (meta.creator !== undefined) out.creator = meta.creator;
  if (meta.shareUrl !== undefined) out.shareUrl = meta.shareUrl;
  return out;
}
