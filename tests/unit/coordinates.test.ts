import * as cheerio from "cheerio";
import { describe, expect, it } from "vitest";
import {
  extractCoordinates,
  geoTag,
  kartographerMapLink,
  latitudeLongitude,
  parseDecimal,
} from "../../scripts/coordinates";

function scope(html: string) {
  return cheerio.load(html).root();
}

describe("parseDecimal", () => {
  it("parses plain decimals only", () => {
    expect(parseDecimal(" 49.2 ")).toBe(49.2);
    expect(parseDecimal("-122.31")).toBe(-122.31);
    expect(parseDecimal("49°12′N")).toBeNull();
    expect(parseDecimal("4.9e1")).toBe(49);
    expect(parseDecimal(".5")).toBe(0.5);
    expect(parseDecimal("")).toBeNull();
    expect(parseDecimal(undefined)).toBeNull();
  });

  it("rejects non-decimal number literals", () => {
    expect(parseDecimal("0x31")).toBeNull();
    expect(parseDecimal("0b110001")).toBeNull();
    expect(parseDecimal("0o61")).toBeNull();
    expect(parseDecimal("Infinity")).toBeNull();
  });

  it("ignores a geo span written as hex", () => {
    expect(geoTag.extract(scope(`<span class="geo">0x31; -122.3</span>`))).toBeNull();
  });
});

describe("coordinate strategies", () => {
  it("reads a geo span separated by a semicolon", () => {
    expect(geoTag.extract(scope(`<span class="geo">49.0316; -122.3155</span>`))).toEqual({
      lat: 49.0316,
      lon: -122.3155,
    });
  });

  it("reads a geo span separated by whitespace", () => {
    expect(geoTag.extract(scope(`<span class="geo">50.67 -120.33</span>`))).toEqual({
      lat: 50.67,
      lon: -120.33,
    });
  });

  it("reads separate latitude and longitude spans", () => {
    const html = `<span class="latitude">53.9171</span>, <span class="longitude">-122.7497</span>`;
    expect(latitudeLongitude.extract(scope(html))).toEqual({ lat: 53.9171, lon: -122.7497 });
  });

  it("reads the data attributes of a map link", () => {
    const html = `<a class="mw-kartographer-maplink" data-lat="48.4329" data-lon="-123.3266">map</a>`;
    expect(kartographerMapLink.extract(scope(html))).toEqual({ lat: 48.4329, lon: -123.3266 });
  });

  it("rejects a half-filled pair", () => {
    const html = `<a class="mw-kartographer-maplink" data-lat="48.4329">map</a>`;
    expect(kartographerMapLink.extract(scope(html))).toBeNull();
  });
});

describe("extractCoordinates", () => {
  it("prefers the geo span over a map link", () => {
    const html = `
      <a class="mw-kartographer-maplink" data-lat="10" data-lon="20">map</a>
      <span class="geo">49.1; -123.1</span>
    `;
    expect(extractCoordinates(scope(html))).toEqual({ lat: 49.1, lon: -123.1 });
  });

  it("falls through when the geo span holds degree-minute-second text", () => {
    const html = `
      <span class="geo">49°10′N 122°50′W</span>
      <a class="mw-kartographer-maplink" data-lat="49.1765" data-lon="-122.8424">map</a>
    `;
    expect(extractCoordinates(scope(html))).toEqual({ lat: 49.1765, lon: -122.8424 });
  });

  it("returns null when no strategy matches", () => {
    expect(extractCoordinates(scope("<p>No location given</p>"))).toBeNull();
  });
});
