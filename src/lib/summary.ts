import type { BedSizeClass, Hospital, HospitalSummary } from "./types";

export const ALL_AUTHORITIES = "All";

export type AuthorityCount = { name: string; count: number };

/** Authorities present in the data, alphabetical, with row counts. */
export function listAuthorities(hospitals: Hospital[]): AuthorityCount[] {
  const counts = new Map<string, number>();
  for (const h of hospitals) {
    counts.set(h.healthAuthority, (counts.get(h.healthAuthority) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([name, count]) => ({ name, count }))
    .sort((a, b) => a.name.localeCompare(b.name));
}

export function filterByAuthority(hospitals: Hospital[], authority: string): Hospital[] {
  if (authority === ALL_AUTHORITIES) return hospitals;
  return hospitals.filter((h) => h.healthAuthority === authority);
}

/**
 * `total` counts every hospital; the bed figures only use hospitals that
 * report a bed count.
 */
export function summarizeHospitals(hospitals: Hospital[]): HospitalSummary {
  const beds = hospitals
    .map((h) => h.beds)
    .filter((b): b is number => b !== null);

  const totalBeds = beds.reduce((sum, b) => sum + b, 0);

  return {
    total: hospitals.length,
    withBeds: beds.length,
    totalBeds,
    averageBeds: beds.length ? totalBeds / beds.length : null,
    largest: beds.length ? Math.max(...beds) : null,
    smallest: beds.length ? Math.min(...beds) : null,
  };
}

export function bedSizeClass(beds: number | null): BedSizeClass {
  if (beds === null) return "unknown";
  if (beds >= 200) return "large";
  if (beds >= 100) return "medium";
  return "small";
}

export function formatBeds(beds: number | null): string {
  return beds === null ? "N/A" : beds.toLocaleString("en-US");
}

export function sortByName(hospitals: Hospital[]): Hospital[] {
  return [...hospitals].sort((a, b) => a.name.localeCompare(b.name));
}
