import { bedSizeClass } from "./summary";
import type { Hospital, HospitalCollection, HospitalFeature } from "./types";

/** Point features for hospitals that have coordinates; the rest are left off the map. */
export function toFeatureCollection(hospitals: Hospital[]): HospitalCollection {
  const features: HospitalFeature[] = [];

  for (const h of hospitals) {
    if (h.lat === null || h.lon === null) continue;
    features.push({
      type: "Feature",
      id: h.id,
      geometry: { type: "Point", coordinates: [h.lon, h.lat] },
      properties: { ...h, bedClass: bedSizeClass(h.beds) },
    });
  }

  return { type: "FeatureCollection", features };
}

/** [[west, south], [east, north]] of the features, or null for an empty collection. */
export function boundsOf(
  collection: HospitalCollection,
): [[number, number], [number, number]] | null {
  if (collection.features.length === 0) return null;

  const empty: [[number, number], [number, number]] = [
    [Infinity, Infinity],
    [-Infinity, -Infinity],
  ];

  return collection.features.reduce(
    (b, f) => {
      const [lng, lat] = f.geometry.coordinates;
      b[0][0] = Math.min(b[0][0], lng);
      b[0][1] = Math.min(b[0][1], lat);
      b[1][0] = Math.max(b[1][0], lng);
      b[1][1] = Math.max(b[1][1], lat);
      return b;
    },
    empty,
  );
}
