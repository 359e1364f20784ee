// scripts/detail.ts
// Facts read from a hospital's own page: infobox bed count and coordinates

import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { extractCoordinates } from "./coordinates";
import { cleanText } from "./markup";
import type { Coordinates } from "./types";

export const BEDS_LABEL = "beds";

export type BedCount = {
  beds_raw: string | null;
  beds: number | null;
};

export type HospitalPageFacts = BedCount & {
  coordinates: Coordinates | null;
};

/** First run of 1-4 digits once thousands separators are dropped. */
export function parseBedCount(raw: string): number | null {
  const m = raw.replace(/,/g, "").match(/(\d{1,4})/);
  return m ? parseInt(m[1], 10) : null;
}

export function extractBeds($: CheerioAPI): BedCount {
  const infobox = $("table.infobox").first();
  if (!infobox.length) return { beds_raw: null, beds: null };

  for (const tr of infobox.find("tr").toArray()) {
    const th = $(tr).find("th").first();
    const td = $(tr).find("td").first();
    if (!th.length || !td.length) continue;

    const label = cleanText(th[0]).toLowerCase();
    if (label.startsWith(BEDS_LABEL)) {
      const beds_raw = cleanText(td[0]);
      return { beds_raw, beds: parseBedCount(beds_raw) };
    }
  }

  return { beds_raw: null, beds: null };
}

export function parseHospitalPage(html: string): HospitalPageFacts {
  const $ = cheerio.load(html);
  return {
    ...extractBeds($),
    coordinates: extractCoordinates($.root()),
  };
}
