import { useState } from "react";
import type { FormEvent } from "react";
import clsx from "clsx";
import { SEVERITIES, type DispatchForm, type Severity } from "@/types";
import { EQUIPMENT_CATALOG } from "@/config/resources";
import { FORM_DEFAULTS, parseWaterLiters } from "@/lib/form";

const SEV_BTN: Record<Severity, string> = {
  Low: "bg-emerald-50 text-emerald-700 ring-1 ring-emerald-200",
  Medium: "bg-amber-50 text-amber-700 ring-1 ring-amber-200",
  High: "bg-red-50 text-red-700 ring-1 ring-red-200",
};

export default function IncidentForm({
  busy,
  onDispatch,
}: {
  busy: boolean;
  onDispatch: (form: DispatchForm) => void;
}) {
  const [incidentType, setIncidentType] = useState("");
  const [severity, setSeverity] = useState<Severity>(FORM_DEFAULTS.severity);
  const [latitude, setLatitude] = useState("");
  const [longitude, setLongitude] = useState("");
  const [water, setWater] = useState(FORM_DEFAULTS.water);
  const [equipment, setEquipment] = useState<string[]>([]);

  function toggle(item: string) {
    setEquipment((prev) =>
      prev.includes(item) ? prev.filter((x) => x !== item) : EQUIPMENT_CATALOG.filter((x) => x === item || prev.includes(x))
    );
  }

  function submit(e: FormEvent) {
    e.preventDefault();
    if (busy) return;
    onDispatch({
      incidentType,
      severity,
      latitude,
      longitude,
      equipment,
      waterUsedLiters: parseWaterLiters(water),
    });
  }

  return (
    <form onSubmit={submit} className="grid gap-4">
      <div className="grid gap-4 md:grid-cols-2">
        <div className="border rounded-lg p-4 grid gap-3">
          <h2 className="text-lg font-semibold">📍 Incident Details</h2>

          <label className="grid gap-1 text-sm">
            <span className="font-medium">Incident Type</span>
            <input
              value={incidentType}
              onChange={(e) => setIncidentType(e.target.value)}
              placeholder="Building Fire / Road Accident"
              className="border rounded px-2 py-1.5"
            />
          </label>

          <div className="flex flex-wrap items-center gap-2">
            <div className="text-sm font-medium mr-2">Severity Level:</div>
            {SEVERITIES.map((s) => (
              <button
                key={s}
                type="button"
                onClick={() => setSeverity(s)}
                aria-pressed={severity === s}
                className={clsx("px-2.5 py-1.5 rounded text-sm", SEV_BTN[s], severity === s && "ring-2")}
              >
                {s}
              </button>
            ))}
          </div>

          <div className="grid grid-cols-2 gap-3">
            <label className="grid gap-1 text-sm">
              <span className="font-medium">Latitude</span>
              <input
                value={latitude}
                onChange={(e) => setLatitude(e.target.value)}
                placeholder="12.9756"
                className="border rounded px-2 py-1.5"
              />
            </label>
            <label className="grid gap-1 text-sm">
              <span className="font-medium">Longitude</span>
              <input
                value={longitude}
                onChange={(e) => setLongitude(e.target.value)}
                placeholder="77.5950"
                className="border rounded px-2 py-1.5"
              />
            </label>
          </div>

          <label className="grid gap-1 text-sm">
            <span className="font-medium">Water Used (Liters)</span>
            <input
              type="number"
              value={water}
              onChange={(e) => setWater(e.target.value)}
              className="border rounded px-2 py-1.5"
            />
          </label>
        </div>

        <div className="border rounded-lg p-4 grid gap-2 content-start">
          <h2 className="text-lg font-semibold">🧰 Equipment Allocation</h2>
          <div className="text-sm text-gray-600">Select Equipment Used</div>
          {EQUIPMENT_CATALOG.map((item) => (
            <label key={item} className="flex items-center gap-2 text-sm">
              <input type="checkbox" checked={equipment.includes(item)} onChange={() => toggle(item)} />
              {item}
            </label>
          ))}
        </div>
      </div>

      <button
        type="submit"
        disabled={busy}
        className={clsx(
          "rounded-lg px-4 py-2.5 font-semibold text-white",
          busy ? "bg-red-300 cursor-wait" : "bg-red-600 hover:bg-red-700"
        )}
      >
        🚨 DISPATCH RESPONSE UNIT
      </button>
    </form>
  );
}
