import { stringify } from "csv-stringify/sync";
import type { MapsListData } from "../types";

export const CSV_COLUMNS = [
  { key: "name", header: "Name" },
  { key: "address", header: "Address" },
  { key: "notes", header: "Notes" },
  { key: "latitude", header: "Latitude" },
  { key: "longitude", header: "Longitude" },
];

export function buildCsv(list: MapsListData): string {
  const rows = list.places.map((p) => ({
    name: p.name,
    address: p.address ?? "",
    notes: p.notes ?? "",
    latitude: p.coordinates?.lat ?? "",
    longitude: p.coordinates?.lon ?? "",
  }));

  return stringify(rows, { header: true, columns: CSV_COLUMNS });
}
