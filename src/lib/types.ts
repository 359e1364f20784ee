import type { Feature, FeatureCollection, Point } from "geojson";

/** One row of the hospitals CSV as the dashboard sees it. */
export type Hospital = {
  id: string;
  healthAuthority: string;
  name: string;
  city: string;

  lat: number | null;
  lon: number | null;

  beds: number | null;
  bedsRaw: string | null;
  bedsSourceUrl: string | null;
  pageUrl: string | null;
};

export type BedSizeClass = "large" | "medium" | "small" | "unknown";

export type HospitalProperties = Hospital & { bedClass: BedSizeClass };

/** A GeoJSON point feature whose properties carry the hospital row. */
export type HospitalFeature = Feature<Point, HospitalProperties>;

export type HospitalCollection = FeatureCollection<Point, HospitalProperties>;

export type HospitalSummary = {
  total: number;
  withBeds: number;
  totalBeds: number;
  averageBeds: number | null;
  largest: number | null;
  smallest: number | null;
};
