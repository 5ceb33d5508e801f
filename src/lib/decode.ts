import { COORDINATE_OFFSETS, LIST_OFFSETS, LOCATION_OFFSETS, PLACE_OFFSETS } from "./payload-layout";
import { signatureUrl } from "./signature";
import { arrayAt, numberAt, stringAt } from "./tree";
import type { ArrayNode } from "./tree";
import { createListData, isBlank } from "./types";
import type { LatLon, MapsListData, MapsPlace } from "./types";
import { silentLogger } from "./log";
import type { Logger } from "./log";

export type DecodeOptions = {
  logger?: Logger;
};

function decodeCoordinates(location: ArrayNode): LatLon | undefined {
  const coords = arrayAt(location, LOCATION_OFFSETS.coordinates);
  if (!coords) return undefined;

  const lat = numberAt(coords, COORDINATE_OFFSETS.lat);
  const lon = numberAt(coords, COORDINATE_OFFSETS.lon);
  if (lat === undefined || lon === undefined) return undefined;
  return { lat, lon };
}

/**
 * Decode one place entry. Returns null (entry dropped) when it has no usable name.
 */
export function decodePlace(entry: ArrayNode, logger: Logger = silentLogger): MapsPlace | null {
  const name = stringAt(entry, PLACE_OFFSETS.name);
  if (name === undefined || isBlank(name)) {
    logger.debug("Skipping a place entry without a name.");
    return null;
  }

  const place: MapsPlace = { name };

  const notes = stringAt(entry, PLACE_OFFSETS.notes);
  if (notes !== undefined) place.notes = notes;

  const location = arrayAt(entry, PLACE_OFFSETS.location);
  if (!location) {
    logger.debug(`Place "${name}" has no location block.`);
    return place;
  }

  const address = stringAt(location, LOCATION_OFFSETS.address);
  if (address !== undefined) place.address = address;
  else logger.debug(`Place "${name}" has no address.`);

  const coordinates = decodeCoordinates(location);
  if (coordinates) place.coordinates = coordinates;
  else logger.debug(`Place "${name}" has no coordinates.`);

  return place;
}

/**
 * Decode the matched list array into list data.
 * Throws `RequiredFieldMissing` when the list has no name; bad place entries are skipped.
 */
export function decodeList(list: ArrayNode, options: DecodeOptions = {}): MapsListData {
  const logger = options.logger ?? silentLogger;

  const creatorBlock = arrayAt(list, LIST_OFFSETS.creator);
  const creator = creatorBlock ? stringAt(creatorBlock, LIST_OFFSETS.creatorName) : undefined;

  const places: MapsPlace[] = [];
  const entries = arrayAt(list, LIST_OFFSETS.places);
  if (entries) {
    for (const entry of entries.items) {
      if (entry.kind !== "array") {
        logger.debug(`Skipping a place entry of kind ${entry.kind}.`);
        continue;
      }
      const place = decodePlace(entry, logger);
      if (place) places.push(place);
    }
  } else {
    logger.debug("List payload has no place entries.");
  }

  return createListData(
    {
      name: stringAt(list, LIST_OFFSETS.name) ?? "",
      description: stringAt(list, LIST_OFFSETS.description),
      creator,
      shareUrl: signatureUrl(list),
    },
    places
  );
}
