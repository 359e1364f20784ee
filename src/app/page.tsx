import path from "node:path";
import { HospitalDashboard } from "@/components/HospitalDashboard";
import { readHospitalDataset } from "@/lib/dataset";
import { datasetPathFromEnv } from "../../scripts/config";

// Read the CSV on every request so a fresh scrape shows up without a rebuild
export const dynamic = "force-dynamic";

export default async function Home() {
  const datasetPath = path.resolve(datasetPathFromEnv(process.env));
  const hospitals = await readHospitalDataset(datasetPath);

  if (hospitals === null) {
    return (
      <main className="flex h-dvh items-center justify-center p-6">
        <div className="max-w-md rounded-xl border border-red-200 bg-red-50 p-6 text-sm text-red-800 shadow-sm">
          <h1 className="mb-2 text-base font-semibold">Hospital data not found</h1>
          <p>
            <code className="font-mono">{path.basename(datasetPath)}</code> does not exist yet.
            Run <code className="font-mono">npm run scrape</code> first, then reload this page.
          </p>
        </div>
      </main>
    );
  }

  return <HospitalDashboard hospitals={hospitals} />;
}
