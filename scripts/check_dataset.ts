// scripts/check_dataset.ts
// Quick look at the scraped CSV: row counts, bed coverage, coordinate QA

import "dotenv/config";
import { readHospitalDataset } from "../src/lib/dataset";
import type { Hospital } from "../src/lib/types";
import { datasetPathFromEnv } from "./config";
import { DATASET_COLUMNS } from "./types";
import { isInsideBC } from "./validation";

type CoordinateQa = {
  withCoordinates: number;
  withoutCoordinates: number;
  outsideBC: number;
};

function coordinateQa(hospitals: Hospital[]): CoordinateQa {
  let withCoordinates = 0;
  let outsideBC = 0;
  for (const h of hospitals) {
    if (h.lat === null || h.lon === null) continue;
    withCoordinates++;
    if (!isInsideBC({ lat: h.lat, lon: h.lon })) outsideBC++;
  }
  return {
    withCoordinates,
    withoutCoordinates: hospitals.length - withCoordinates,
    outsideBC,
  };
}

async function main() {
  const csvPath = process.argv[2] || datasetPathFromEnv(process.env);
  const hospitals = await readHospitalDataset(csvPath);

  if (hospitals === null) {
    console.error(`❌ ${csvPath} not found. Run \`npm run scrape\` first.`);
    process.exit(1);
  }

  console.log(`Total hospitals collected: ${hospitals.length}`);
  console.log(`Columns: ${DATASET_COLUMNS.join(", ")}`);

  console.log("\nFirst few rows:");
  console.table(
    hospitals.slice(0, 5).map((h) => ({
      "Health Authority": h.healthAuthority,
      "Facility Name": h.name,
      "Location City": h.city,
      Latitude: h.lat ?? "",
      Longitude: h.lon ?? "",
      Beds: h.beds ?? "",
    }))
  );

  console.log("\nHospitals with bed count data:");
  const withBeds = hospitals.filter((h) => h.beds !== null);
  console.log(`Found bed data for ${withBeds.length} hospitals`);
  if (withBeds.length > 0) {
    console.table(
      withBeds.slice(0, 5).map((h) => ({
        "Facility Name": h.name,
        Beds: h.beds,
        "Health Authority": h.healthAuthority,
      }))
    );
  }

  const qa = coordinateQa(hospitals);
  console.log(
    `\n📍 Coordinates: ${qa.withCoordinates} with, ${qa.withoutCoordinates} without, ${qa.outsideBC} outside BC`
  );
}

main().catch((e) => {
  console.error("❌ check_dataset failed:", e);
  process.exit(1);
});
