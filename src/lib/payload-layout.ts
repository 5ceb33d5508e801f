// Offsets into the anonymous arrays of the list page's initialization payload.
// Reverse-engineered from captured pages, not a published format. A change in
// any position here is a new payload version: update this table from fresh
// captures rather than patching call sites.
//
// Layout version 1:
//
//   list = [ _, _, [_, _, shareUrl], [creator], name, description, _, _, [entry, ...] ]
//   entry = [ _, location, name, notes ]
//   location = [ _, _, _, _, address, [_, _, lat, lon] ]

export const PAYLOAD_LAYOUT_VERSION = 1;

export const SIGNATURE = {
  /** Offset of the sub-array holding the share URL inside the list array. */
  holderOffset: 2,
  /** Offset of the share URL inside that sub-array. */
  urlOffset: 2,
  urlMarker: "https://www.google.com/maps/placelists/list/",
} as const;

export const LIST_OFFSETS = {
  creator: 3,
  creatorName: 0,
  name: 4,
  description: 5,
  places: 8,
} as const;

export const PLACE_OFFSETS = {
  location: 1,
  name: 2,
  notes: 3,
} as const;

export const LOCATION_OFFSETS = {
  address: 4,
  coordinates: 5,
} as const;

export const COORDINATE_OFFSETS = {
  lat: 2,
  lon: 3,
} as const;
