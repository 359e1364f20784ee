// scripts/coordinates.ts
// Decimal coordinates from the geo microformats used on listing rows and hospital pages

import type { Cheerio } from "cheerio";
import type { AnyNode } from "domhandler";
import { cleanText } from "./markup";
import type { Coordinates } from "./types";

export type CoordinateStrategy = {
  name: string;
  extract: (scope: Cheerio<AnyNode>) => Coordinates | null;
};

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Strict decimal parse: "49.2" -> 49.2, "49°12′N" -> null, "0x31" -> null, "" -> null. */
export function parseDecimal(text: string | undefined): number | null {
  const s = (text ?? "").trim();
  if (!DECIMAL.test(s)) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

function coordinatePair(latText: string | undefined, lonText: string | undefined): Coordinates | null {
  const lat = parseDecimal(latText);
  const lon = parseDecimal(lonText);
  if (lat === null || lon === null) return null;
  return { lat, lon };
}

// <span class="geo">49.0316; -122.3155</span>
export const geoTag: CoordinateStrategy = {
  name: "geo",
  extract(scope) {
    const geo = scope.find(".geo").first();
    if (!geo.length) return null;

    const parts = cleanText(geo[0])
      .split(/[;,\s]+/)
      .filter(Boolean);
    if (parts.length < 2) return null;

    return coordinatePair(parts[0], parts[1]);
  },
};

// <span class="latitude">49.03</span> ... <span class="longitude">-122.31</span>
export const latitudeLongitude: CoordinateStrategy = {
  name: "latitude/longitude",
  extract(scope) {
    const lat = scope.find(".latitude").first();
    const lon = scope.find(".longitude").first();
    if (!lat.length || !lon.length) return null;

    return coordinatePair(cleanText(lat[0]), cleanText(lon[0]));
  },
};

// <a class="mw-kartographer-maplink" data-lat="49.03" data-lon="-122.31">
export const kartographerMapLink: CoordinateStrategy = {
  name: "maplink",
  extract(scope) {
    const link = scope.find("a.mw-kartographer-maplink").first();
    if (!link.length) return null;

    return coordinatePair(link.attr("data-lat"), link.attr("data-lon"));
  },
};

export const COORDINATE_STRATEGIES: readonly CoordinateStrategy[] = [
  geoTag,
  latitudeLongitude,
  kartographerMapLink,
];

/** First strategy that yields a full pair wins; null when none does. */
export function extractCoordinates(
  scope: Cheerio<AnyNode>,
  strategies: readonly CoordinateStrategy[] = COORDINATE_STRATEGIES
): Coordinates | null {
  for (const strategy of strategies) {
    const coords = strategy.extract(scope);
    if (coords) return coords;
  }
  return null;
}
