import type { IncidentRecord } from "@/types";

export const HISTORY_COLUMNS = [
    "Incident",
    "Location",
    "Severity",
    "Vehicle",
    "Officers",
    "Route",
    "ETA (min)",
    "Equipment Used",
    "Water Used (L)",
] as const;

export type HistoryColumn = (typeof HISTORY_COLUMNS)[number];
export type HistoryRow = Record<HistoryColumn, string | number>;

/**
 * Append-only log of dispatched incidents, kept for the life of the page.
 * Records are frozen on the way in.
 */
export class IncidentHistory {
    private readonly records: IncidentRecord[] = [];

    append(record: IncidentRecord): IncidentRecord {
        const frozen = Object.freeze({
            ...record,
            location: Object.freeze({ ...record.location }),
            officers: Object.freeze([...record.officers]),
            equipment: Object.freeze([...record.equipment]),
        });
        this.records.push(frozen);
        return frozen;
    }

    all(): readonly IncidentRecord[] {
        return this.records.slice();
    }

    get size(): number {
        return this.records.length;
    }
}

export function toHistoryRow(r: IncidentRecord): HistoryRow {
    return {
        "Incident": r.incidentType,
        "Location": r.locationText,
        "Severity": r.severity,
        "Vehicle": r.vehicle,
        "Officers": r.officers.join(", "),
        "Route": r.route,
        "ETA (min)": r.etaMinutes,
        "Equipment Used": r.equipment.join(", "),
        "Water Used (L)": r.waterUsedLiters,
    };
}
