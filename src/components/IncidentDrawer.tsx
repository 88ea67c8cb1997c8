import type { IncidentRecord } from "@/types";

export default function IncidentDrawer({
  record,
  index,
  onClose,
}: {
  record?: IncidentRecord;
  index?: number;
  onClose: () => void;
}) {
  if (!record) return null;
  const loc = record.location;

  return (
    <div className="fixed inset-0 z-[4000] bg-black/20" onClick={onClose}>
      <div
        className="absolute right-0 top-0 h-full w-full max-w-md bg-white border-l p-4 overflow-y-auto"
        onClick={(e) => e.stopPropagation()}
      >
        <div className="flex items-center justify-between">
          <div className="text-lg font-semibold">Incident #{index ?? ""}</div>
          <button onClick={onClose} className="px-2 py-1 border rounded text-sm">Close</button>
        </div>

        <h2 className="text-xl font-bold mt-2">{record.incidentType || "Incident"}</h2>

        <div className="mt-1 inline-flex items-center gap-2">
          <span className="text-xs px-2 py-0.5 rounded border">{String(record.severity).toUpperCase()}</span>
          <span className="text-xs text-gray-600">
            {loc.lat.toFixed(4)}, {loc.lon.toFixed(4)}
          </span>
        </div>

        <div className="mt-3">
          <div className="text-xs font-medium text-gray-600 mb-1">Crew</div>
          <div className="flex flex-wrap gap-2">
            {record.officers.map((o) => (
              <span key={o} className="text-xs px-2 py-0.5 rounded-full border bg-white">
                {o}
              </span>
            ))}
          </div>
        </div>

        <div className="mt-4 border rounded">
          <div className="px-3 py-2 border-b font-medium">Details</div>
          <div className="p-3 text-sm space-y-1">
            <div><span className="font-semibold">Vehicle:</span> {record.vehicle}</div>
            <div><span className="font-semibold">Route:</span> {record.route} · {record.etaMinutes} min</div>
            <div><span className="font-semibold">Equipment:</span> {record.equipment.join(", ") || "—"}</div>
            <div><span className="font-semibold">Water:</span> {record.waterUsedLiters} L</div>
          </div>
        </div>
      </div>
    </div>
  );
}
