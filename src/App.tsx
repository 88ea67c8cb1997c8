import { useEffect, useRef, useState } from "react";
import clsx from "clsx";

import IncidentForm from "@/components/IncidentForm";
import HistoryTable from "@/components/HistoryTable";
import ChartImage from "@/components/ChartImage";
import MapView from "@/components/MapView";
import IncidentDrawer from "@/components/IncidentDrawer";
import { ToastProvider, useToast } from "@/components/Toaster";

import type { DispatchForm, IncidentRecord, Stage } from "@/types";
import { IncidentHistory } from "@/lib/history";
import { dispatchIncident, reportDispatchFailure, type DispatchResult } from "@/lib/dispatch";
import { equipmentChart, waterChart } from "@/lib/charts";
import { mapDocumentToHtml } from "@/lib/map";
import { STAGE_MESSAGES } from "@/lib/report";

const STAGE_BADGE: Record<Stage, string> = {
  dispatched: "bg-red-100 text-red-700",
  on_scene: "bg-yellow-100 text-yellow-700",
  resolved: "bg-green-100 text-green-700",
};

// Needs to sit under ToastProvider to reach useToast.
function AppInner() {
  const { push } = useToast();

  // One store per page; dispatches are the only writer.
  const historyRef = useRef(new IncidentHistory());

  const [records, setRecords] = useState<readonly IncidentRecord[]>([]);
  const [result, setResult] = useState<DispatchResult | undefined>(undefined);
  const [stages, setStages] = useState<Stage[]>([]);
  const [busy, setBusy] = useState(false);
  const [selected, setSelected] = useState<number | undefined>(undefined);
  const [mapUrl, setMapUrl] = useState<string | undefined>(undefined);

  // The exported map is transient: each dispatch replaces the previous one.
  useEffect(() => {
    if (!result) return;
    const url = URL.createObjectURL(new Blob([mapDocumentToHtml(result.map)], { type: "text/html" }));
    setMapUrl(url);
    return () => URL.revokeObjectURL(url);
  }, [result]);

  async function handleDispatch(form: DispatchForm) {
    setBusy(true);
    setStages([]);
    try {
      const res = await dispatchIncident(form, {
        history: historyRef.current,
        onStage: (s) => setStages((prev) => [...prev, s]),
      });
      setResult(res);
      setRecords(res.history);
      push(`${res.record.vehicle} dispatched`);
    } catch (err) {
      setStages([]);
      reportDispatchFailure(err, push);
    } finally {
      setBusy(false);
    }
  }

  const selectedRecord = selected === undefined ? undefined : records[selected];

  return (
    <main className="min-h-screen bg-white text-slate-900">
      {/* Header */}
      <header className="sticky top-0 z-[3000] border-b bg-white/80 backdrop-blur">
        <div className="max-w-6xl mx-auto p-4 flex items-center justify-between">
          <div>
            <h1 className="text-xl font-bold">🚨 FIRE STATION COMMAND CENTER</h1>
            <div className="text-sm text-gray-600">AI-Powered Emergency Dispatch &amp; Visualization</div>
          </div>
          <div className="flex items-center gap-2">
            {stages.map((s) => (
              <span key={s} className={clsx("text-xs px-2 py-1 rounded", STAGE_BADGE[s])}>
                {s.replace("_", " ").toUpperCase()}
              </span>
            ))}
          </div>
        </div>
      </header>

      <div className="max-w-6xl mx-auto p-4 grid gap-4">
        <IncidentForm busy={busy} onDispatch={(form) => void handleDispatch(form)} />

        {busy && (
          <ul className="border rounded-lg p-3 text-sm grid gap-1">
            {stages.map((s) => (
              <li key={s}>{STAGE_MESSAGES[s]}</li>
            ))}
          </ul>
        )}

        <div className="grid gap-4 md:grid-cols-2">
          <div className="border rounded-lg p-4">
            <div className="text-base font-semibold mb-3">📄 Dispatch Report</div>
            <pre className="text-xs whitespace-pre-wrap font-mono min-h-[14rem]">{result?.report ?? ""}</pre>
          </div>
          <div>
            <div className="text-base font-semibold mb-3">📊 Incident &amp; Dispatch History</div>
            <HistoryTable records={records} selectedIndex={selected} onSelect={setSelected} />
          </div>
        </div>

        <div className="grid gap-4 md:grid-cols-3">
          <ChartImage caption="📈 Equipment Usage Chart" chart={result?.equipmentChart ?? equipmentChart({})} />
          <ChartImage caption="💧 Water Usage Trends" chart={result?.waterChart ?? waterChart(records)} />
          <div className="border rounded-lg p-4">
            <div className="flex items-center justify-between mb-3">
              <div className="text-base font-semibold">🗺️ Vehicle Movement Map</div>
              {mapUrl && (
                <a href={mapUrl} download="map.html" className="border rounded px-2 py-1 text-xs hover:bg-gray-50">
                  Export
                </a>
              )}
            </div>
            <MapView doc={result?.map} />
          </div>
        </div>
      </div>

      <IncidentDrawer record={selectedRecord} index={selected} onClose={() => setSelected(undefined)} />
    </main>
  );
}

export default function App() {
  return (
    <ToastProvider>
      <AppInner />
    </ToastProvider>
  );
}
