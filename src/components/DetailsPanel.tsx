"use client";

import { BedDouble, Building2, ExternalLink, MapPin, X } from "lucide-react";
import { AnimatePresence, motion } from "motion/react";
import type { Hospital } from "@/lib/types";
import { formatBeds } from "@/lib/summary";

type Props = {
  hospital: Hospital | null;
  onClose: () => void;
};

function formatCoordinates(h: Hospital) {
  if (h.lat === null || h.lon === null) return null;
  return `${h.lat.toFixed(4)}, ${h.lon.toFixed(4)}`;
}

export function DetailsPanel({ hospital, onClose }: Props) {
  return (
    <AnimatePresence>
      {hospital && (
        <>
          {/* Overlay */}
          <motion.div
            initial={{ opacity: 0 }}
            animate={{ opacity: 1 }}
            exit={{ opacity: 0 }}
            onClick={onClose}
            className="fixed inset-0 z-40 bg-black/30"
            aria-hidden
          />

          {/* Panel */}
          <motion.aside
            initial={{ x: "100%" }}
            animate={{ x: 0 }}
            exit={{ x: "100%" }}
            transition={{ type: "spring", damping: 30, stiffness: 300 }}
            className="
              fixed z-50 bg-white shadow-2xl text-gray-900 overflow-hidden
              md:top-0 md:right-0 md:h-full md:w-[420px]
              bottom-0 left-0 right-0 md:left-auto
              max-h-[70vh] md:max-h-none
            "
          >
            <div className="flex h-full flex-col overflow-auto">
              <div className="flex shrink-0 items-center justify-between border-b px-4 py-3">
                <h2 className="font-semibold text-base text-gray-900">
                  {hospital.name}
                </h2>
                <button
                  type="button"
                  onClick={onClose}
                  aria-label="Close details"
                  className="rounded-lg p-1.5 text-gray-600 hover:bg-gray-100"
                >
                  <X className="size-5" />
                </button>
              </div>

              <div className="flex-1 space-y-6 overflow-auto p-6">
                <div className="grid grid-cols-2 gap-4">
                  <div className="flex items-start gap-3 rounded-lg bg-gray-50 p-3">
                    <BedDouble className="mt-0.5 size-5 shrink-0 text-gray-600" />
                    <div>
                      <p className="text-xs text-gray-600">Beds</p>
                      <p className="font-medium text-gray-900">{formatBeds(hospital.beds)}</p>
                      {hospital.bedsRaw && hospital.bedsRaw !== String(hospital.beds) && (
                        <p className="text-xs text-gray-500">“{hospital.bedsRaw}”</p>
                      )}
                    </div>
                  </div>

                  <div className="flex items-start gap-3 rounded-lg bg-gray-50 p-3">
                    <Building2 className="mt-0.5 size-5 shrink-0 text-gray-600" />
                    <div>
                      <p className="text-xs text-gray-600">Health Authority</p>
                      <p className="font-medium text-gray-900">{hospital.healthAuthority}</p>
                    </div>
                  </div>

                  <div className="col-span-2 flex items-start gap-3 rounded-lg bg-gray-50 p-3">
                    <MapPin className="mt-0.5 size-5 shrink-0 text-gray-600" />
                    <div>
                      <p className="text-xs text-gray-600">Location</p>
                      <p className="text-sm font-medium text-gray-900">
                        {hospital.city || "Unknown city"}
                      </p>
                      <p className="text-xs text-gray-500">
                        {formatCoordinates(hospital) ?? "No coordinates"}
                      </p>
                    </div>
                  </div>
                </div>

                <div className="space-y-2 text-sm">
                  {hospital.pageUrl && (
                    <a
                      href={hospital.pageUrl}
                      target="_blank"
                      rel="noreferrer"
                      className="flex items-center gap-1.5 text-blue-700 hover:underline"
                    >
                      <ExternalLink className="size-4" />
                      Hospital page
                    </a>
                  )}
                  {hospital.bedsSourceUrl && hospital.bedsSourceUrl !== hospital.pageUrl && (
                    <a
                      href={hospital.bedsSourceUrl}
                      target="_blank"
                      rel="noreferrer"
                      className="flex items-center gap-1.5 text-blue-700 hover:underline"
                    >
                      <ExternalLink className="size-4" />
                      Bed count source
                    </a>
                  )}
                </div>
              </div>
            </div>
          </motion.aside>
        </>
      )}
    </AnimatePresence>
  );
}
