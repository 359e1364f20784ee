// scripts/listing.ts
// Listing page -> one HospitalRecord per facility row

import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import { extractCoordinates } from "./coordinates";
import { cleanText, tableRows, tablesUnder } from "./markup";
import { HEALTH_AUTHORITIES, type HealthAuthority, type HospitalRecord } from "./types";

export function absUrl(base: string, href: string): string | null {
  try {
    return new URL(href, base).toString();
  } catch {
    console.warn(`[warn] Ignoring unparseable link: ${href}`);
    return null;
  }
}

export function buildListingRecords(
  $: CheerioAPI,
  tables: Element[],
  section: HealthAuthority,
  baseUrl: string
): HospitalRecord[] {
  const records: HospitalRecord[] = [];

  for (const table of tables) {
    for (const { row, cells } of tableRows($, table)) {
      const facilityCell = cells[0];
      const facility_name = cleanText(facilityCell);
      if (!facility_name) continue;

      const href = $(facilityCell).find("a[href]").first().attr("href");
      const hospital_url = href ? absUrl(baseUrl, href) : null;

      records.push({
        health_authority: section,
        facility_name,
        city: cleanText(cells[1]),
        // geo markup can sit in any cell of the row
        coordinates: extractCoordinates($(row)),
        hospital_url,
      });
    }
  }

  return records;
}

/** All facility rows of the listing page, section by section in `sections` order. */
export function parseListingPage(
  html: string,
  baseUrl: string,
  sections: readonly HealthAuthority[] = HEALTH_AUTHORITIES
): HospitalRecord[] {
  const $ = cheerio.load(html);
  return sections.flatMap((section) =>
    buildListingRecords($, tablesUnder($, section), section, baseUrl)
  );
}
