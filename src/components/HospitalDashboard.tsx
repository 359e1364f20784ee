"use client";

import { useEffect, useMemo, useRef, useState } from "react";
import { AuthorityFilter } from "@/components/AuthorityFilter";
import { DetailsPanel } from "@/components/DetailsPanel";
import { HospitalTable } from "@/components/HospitalTable";
import { MapView, type MapHandle } from "@/components/MapView";
import { SummaryMetrics } from "@/components/SummaryMetrics";
import { boundsOf, toFeatureCollection } from "@/lib/geojson";
import {
  ALL_AUTHORITIES,
  filterByAuthority,
  listAuthorities,
  sortByName,
  summarizeHospitals,
} from "@/lib/summary";
import type { Hospital } from "@/lib/types";

type Props = {
  hospitals: Hospital[];
};

const LEGEND = [
  { label: "200+ beds", color: "bg-red-600" },
  { label: "100–199 beds", color: "bg-amber-500" },
  { label: "<100 beds", color: "bg-green-600" },
  { label: "Bed count unknown", color: "bg-gray-400" },
];

export function HospitalDashboard({ hospitals }: Props) {
  const [authority, setAuthority] = useState(ALL_AUTHORITIES);
  const [selected, setSelected] = useState<Hospital | null>(null);
  const mapRef = useRef<MapHandle>(null);

  const geojson = useMemo(() => toFeatureCollection(hospitals), [hospitals]);
  const authorities = useMemo(() => listAuthorities(hospitals), [hospitals]);
  const byId = useMemo(
    () => new Map(hospitals.map((h) => [h.id, h])),
    [hospitals],
  );

  const visibleHospitals = useMemo(
    () => filterByAuthority(hospitals, authority),
    [hospitals, authority],
  );
  const summary = useMemo(() => summarizeHospitals(visibleHospitals), [visibleHospitals]);
  const tableRows = useMemo(() => sortByName(visibleHospitals), [visibleHospitals]);

  useEffect(() => {
    const map = mapRef.current;
    if (!map) return;

    if (authority === ALL_AUTHORITIES) {
      map.applyFilter(null);
    } else {
      map.applyFilter(visibleHospitals.map((h) => h.id));
    }

    const bounds = boundsOf(toFeatureCollection(visibleHospitals));
    if (bounds) map.fitTo(bounds);
  }, [authority, visibleHospitals]);

  function selectHospital(h: Hospital) {
    setSelected(h);
    mapRef.current?.flyToHospital(h.id);
  }

  function handleMapSelect(id: string | null) {
    setSelected(id === null ? null : byId.get(id) ?? null);
  }

  return (
    <main className="mx-auto flex min-h-dvh max-w-7xl flex-col gap-6 p-6">
      <header>
        <h1 className="text-2xl font-semibold">BC Hospital Dashboard</h1>
        <p className="text-sm text-gray-600">
          Explore hospital locations and information across British Columbia
        </p>
      </header>

      <div className="flex flex-wrap items-center gap-3">
        <AuthorityFilter
          authorities={authorities}
          total={hospitals.length}
          selected={authority}
          onChange={setAuthority}
        />
      </div>

      <SummaryMetrics summary={summary} />

      <div className="grid gap-6 lg:grid-cols-2">
        <section className="space-y-2">
          <h2 className="text-lg font-medium">Hospital Locations</h2>
          <div className="h-[480px] overflow-hidden rounded-xl border shadow-sm">
            <MapView ref={mapRef} geojson={geojson} onSelectHospital={handleMapSelect} />
          </div>
          <ul className="flex flex-wrap gap-4 text-xs text-gray-600">
            {LEGEND.map(({ label, color }) => (
              <li key={label} className="flex items-center gap-1.5">
                <span className={`size-3 rounded-full ${color}`} />
                {label}
              </li>
            ))}
          </ul>
        </section>

        <section className="space-y-2">
          <h2 className="text-lg font-medium">Hospital Details</h2>
          <HospitalTable
            hospitals={tableRows}
            selectedId={selected?.id ?? null}
            onSelect={selectHospital}
          />
        </section>
      </div>

      <footer className="border-t pt-4 text-xs italic text-gray-500">
        Data sourced from Wikipedia
      </footer>

      <DetailsPanel hospital={selected} onClose={() => setSelected(null)} />
    </main>
  );
}
