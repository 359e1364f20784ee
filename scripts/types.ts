// Shared types for script files

export const HEALTH_AUTHORITIES = [
  "Fraser Health",
  "Interior Health",
  "Island Health",
  "Northern Health",
  "Vancouver Coastal Health",
  "Provincial Health Services Authority",
  "Providence Health Care",
  "Other",
] as const;

export type HealthAuthority = (typeof HEALTH_AUTHORITIES)[number];

export type Coordinates = {
  lat: number;
  lon: number;
};

/** One facility as listed on the listing page, before its own page is read. */
export type HospitalRecord = {
  health_authority: HealthAuthority;
  facility_name: string;
  city: string;
  coordinates: Coordinates | null;
  hospital_url: string | null;
};

export type EnrichedHospital = HospitalRecord & {
  beds: number | null;
  beds_raw: string | null;
  beds_source_url: string | null;
};

// Column order of the persisted CSV; the dashboard and check script read these names.
export const DATASET_COLUMNS = [
  "Health Authority",
  "Facility Name",
  "Location City",
  "Latitude",
  "Longitude",
  "Beds",
  "Beds Raw",
  "Beds Source URL",
  "Hospital Page URL",
] as const;

export type DatasetColumn = (typeof DATASET_COLUMNS)[number];

export type DatasetRow = Record<DatasetColumn, string>;
