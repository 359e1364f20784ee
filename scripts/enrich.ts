// scripts/enrich.ts
// Fan-out over hospital pages: bed counts, plus coordinates where the listing had none

import pLimit from "p-limit";
import { parseHospitalPage } from "./detail";
import { fetchPage, type HttpSession } from "./http";
import type { EnrichedHospital, HospitalRecord } from "./types";

export type EnrichOptions = {
  session: HttpSession;
  workers: number;
  delayMs: number;
  log?: (message: string) => void;
};

function sleep(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

export function withoutDetails(rec: HospitalRecord): EnrichedHospital {
  return { ...rec, beds: null, beds_raw: null, beds_source_url: null };
}

async function enrichOne(
  rec: HospitalRecord,
  url: string,
  { session, delayMs }: EnrichOptions
): Promise<EnrichedHospital> {
  const html = await fetchPage(url, session);
  if (delayMs > 0) await sleep(delayMs);
  if (html === null) return withoutDetails(rec);

  const facts = parseHospitalPage(html);

  return {
    ...rec,
    // listing-page coordinates always win over the hospital page
    coordinates: rec.coordinates ?? facts.coordinates,
    beds: facts.beds,
    beds_raw: facts.beds_raw,
    beds_source_url: facts.beds_raw ? url : null,
  };
}

/**
 * Fetches each record's hospital page with at most `workers` requests in flight.
 * Records without a page pass straight through. Output order matches input order.
 */
export async function enrichWithHospitalPages(
  records: HospitalRecord[],
  options: EnrichOptions
): Promise<EnrichedHospital[]> {
  const log = options.log ?? console.log;
  const limit = pLimit(options.workers);
  const total = records.filter((r) => r.hospital_url).length;
  let done = 0;

  return Promise.all(
    records.map((rec) => {
      const url = rec.hospital_url;
      if (!url) return withoutDetails(rec);

      return limit(async () => {
        const enriched = await enrichOne(rec, url, options);
        done++;
        log(
          `   [${done}/${total}] ${rec.facility_name} -> beds=${enriched.beds ?? "null"}`
        );
        return enriched;
      });
    })
  );
}
