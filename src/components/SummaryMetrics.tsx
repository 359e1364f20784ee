import type { HospitalSummary } from "@/lib/types";
import { formatBeds } from "@/lib/summary";

type Props = {
  summary: HospitalSummary;
};

function Metric({ label, value, hint }: { label: string; value: string; hint?: string }) {
  return (
    <div className="rounded-xl border bg-white p-4 shadow-sm">
      <p className="text-xs text-gray-600">{label}</p>
      <p className="mt-1 text-2xl font-semibold text-gray-900">{value}</p>
      {hint && <p className="mt-0.5 text-xs text-gray-500">{hint}</p>}
    </div>
  );
}

export function SummaryMetrics({ summary }: Props) {
  return (
    <div className="grid grid-cols-2 gap-3 md:grid-cols-5">
      <Metric label="Total Hospitals" value={summary.total.toLocaleString("en-US")} />
      <Metric
        label="Total Beds"
        value={summary.totalBeds.toLocaleString("en-US")}
        hint={`${summary.withBeds} of ${summary.total} report a bed count`}
      />
      <Metric
        label="Avg Beds"
        value={summary.averageBeds === null ? "N/A" : Math.round(summary.averageBeds).toLocaleString("en-US")}
      />
      <Metric label="Largest" value={formatBeds(summary.largest)} />
      <Metric label="Smallest" value={formatBeds(summary.smallest)} />
    </div>
  );
}
