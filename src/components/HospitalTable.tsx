"use client";

import type { Hospital } from "@/lib/types";
import { formatBeds } from "@/lib/summary";

type Props = {
  hospitals: Hospital[];
  selectedId: string | null;
  onSelect: (hospital: Hospital) => void;
};

export function HospitalTable({ hospitals, selectedId, onSelect }: Props) {
  if (hospitals.length === 0) {
    return (
      <p className="rounded-xl border bg-white p-6 text-center text-sm text-gray-500">
        No hospital details to display.
      </p>
    );
  }

  return (
    <div className="max-h-[480px] overflow-auto rounded-xl border bg-white shadow-sm">
      <table className="w-full text-left text-sm">
        <thead className="sticky top-0 bg-gray-50 text-xs uppercase text-gray-500">
          <tr>
            <th className="px-4 py-2 font-medium">Hospital Name</th>
            <th className="px-4 py-2 font-medium">City</th>
            <th className="px-4 py-2 text-right font-medium">Bed Count</th>
          </tr>
        </thead>
        <tbody>
          {hospitals.map((h) => (
            <tr
              key={h.id}
              onClick={() => onSelect(h)}
              className={`
                cursor-pointer border-t
                ${h.id === selectedId ? "bg-blue-50" : "hover:bg-gray-50"}
              `}
            >
              <td className="px-4 py-2 text-gray-900">{h.name}</td>
              <td className="px-4 py-2 text-gray-600">{h.city || "—"}</td>
              <td className="px-4 py-2 text-right tabular-nums text-gray-900">
                {formatBeds(h.beds)}
              </td>
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
