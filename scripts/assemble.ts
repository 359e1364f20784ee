// scripts/assemble.ts
// Dedupe, sort and serialize the enriched records to the dataset CSV

import { promises as fs } from "node:fs";
import path from "node:path";
import { stringify } from "csv-stringify/sync";
import { DATASET_COLUMNS, type DatasetRow, type EnrichedHospital } from "./types";

/** First occurrence of each (facility name, city) pair wins; comparison is case-sensitive. */
export function dedupeByNameAndCity(records: EnrichedHospital[]): EnrichedHospital[] {
  const seen = new Set<string>();
  const out: EnrichedHospital[] = [];
  for (const r of records) {
    const key = JSON.stringify([r.facility_name, r.city]);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(r);
  }
  return out;
}

// Code-point order, independent of the runtime locale
function compareStrings(a: string, b: string) {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function sortByAuthorityAndName(records: EnrichedHospital[]): EnrichedHospital[] {
  return [...records].sort(
    (a, b) =>
      compareStrings(a.health_authority, b.health_authority) ||
      compareStrings(a.facility_name, b.facility_name)
  );
}

export function assembleDataset(records: EnrichedHospital[]): EnrichedHospital[] {
  return sortByAuthorityAndName(dedupeByNameAndCity(records));
}

function optional(value: string | number | null): string {
  return value === null ? "" : String(value);
}

export function toDatasetRow(r: EnrichedHospital): DatasetRow {
  return {
    "Health Authority": r.health_authority,
    "Facility Name": r.facility_name,
    "Location City": r.city,
    Latitude: optional(r.coordinates?.lat ?? null),
    Longitude: optional(r.coordinates?.lon ?? null),
    Beds: optional(r.beds),
    "Beds Raw": optional(r.beds_raw),
    "Beds Source URL": optional(r.beds_source_url),
    "Hospital Page URL": optional(r.hospital_url),
  };
}

export function datasetToCsv(records: EnrichedHospital[]): string {
  return stringify(records.map(toDatasetRow), {
    header: true,
    columns: [...DATASET_COLUMNS],
  });
}

/** Writes an assembled dataset and returns the number of rows written. */
export async function writeDataset(outPath: string, dataset: EnrichedHospital[]): Promise<number> {
  await fs.mkdir(path.dirname(outPath), { recursive: true });
  await fs.writeFile(outPath, datasetToCsv(dataset), "utf8");
  return dataset.length;
}
