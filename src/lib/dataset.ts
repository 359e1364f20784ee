import { promises as fs } from "node:fs";
import { parse } from "csv-parse/sync";
import type { Hospital } from "./types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function text(row: Record<string, unknown>, column: string): string {
  const v = row[column];
  return typeof v === "string" ? v.trim() : "";
}

function optionalText(row: Record<string, unknown>, column: string): string | null {
  return text(row, column) || null;
}

function optionalNumber(row: Record<string, unknown>, column: string): number | null {
  const s = text(row, column);
  if (!s) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

/**
 * Parse the hospitals CSV. Every column may be empty except Health Authority and
 * Facility Name; rows missing either are skipped. Lat/lon are kept only as a pair.
 */
export function parseHospitalCsv(csvText: string): Hospital[] {
  const records: unknown = parse(csvText, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    bom: true,
  });
  if (!Array.isArray(records)) return [];

  const hospitals: Hospital[] = [];
  for (const row of records) {
    if (!isRecord(row)) continue;

    const name = text(row, "Facility Name");
    const healthAuthority = text(row, "Health Authority");
    if (!name || !healthAuthority) continue;

    const lat = optionalNumber(row, "Latitude");
    const lon = optionalNumber(row, "Longitude");
    const hasCoords = lat !== null && lon !== null;

    hospitals.push({
      id: String(hospitals.length + 1),
      healthAuthority,
      name,
      city: text(row, "Location City"),
      lat: hasCoords ? lat : null,
      lon: hasCoords ? lon : null,
      beds: optionalNumber(row, "Beds"),
      bedsRaw: optionalText(row, "Beds Raw"),
      bedsSourceUrl: optionalText(row, "Beds Source URL"),
      pageUrl: optionalText(row, "Hospital Page URL"),
    });
  }
  return hospitals;
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/** Reads the dataset; null when the file does not exist. */
export async function readHospitalDataset(p: string): Promise<Hospital[] | null> {
  try {
    const csvText = await fs.readFile(p, "utf8");
    return parseHospitalCsv(csvText);
  } catch (e) {
    if (isMissingFile(e)) return null;
    throw e;
  }
}
