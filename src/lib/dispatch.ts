import type { Delay, DispatchForm, IncidentRecord, RandomSource, Stage } from "@/types";
import STATION from "@/config/station";
import { IncidentHistory } from "@/lib/history";
import { routeFor } from "@/lib/routing";
import { allocateEquipment, pickVehicle } from "@/lib/resources";
import { formatReport } from "@/lib/report";
import { equipmentChart, waterChart, type BarChartLayout, type ChartLayout } from "@/lib/charts";
import { parseLocation, renderMap, type MapDocument } from "@/lib/map";
import { defaultRandom } from "@/lib/random";
import { CoercionError } from "@/lib/errors";

export const sleep: Delay = (ms) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export type DispatchDeps = {
    history: IncidentHistory;
    random?: RandomSource;
    delay?: Delay;
    stageDelayMs?: number;
    onStage?: (stage: Stage) => void;
};

export type DispatchResult = {
    report: string;
    record: IncidentRecord;
    history: readonly IncidentRecord[];
    equipmentCounts: Record<string, number>;
    equipmentChart: BarChartLayout;
    waterChart: ChartLayout;
    map: MapDocument;
};

/**
 * Runs one dispatch through Dispatched → On Scene → Resolved.
 * The pauses only pace the narrative; every call reaches Resolved unless the
 * coordinates can't be read, in which case nothing is recorded.
 */
export async function dispatchIncident(
    form: DispatchForm,
    deps: DispatchDeps
): Promise<DispatchResult> {
    const random = deps.random ?? defaultRandom;
    const delay = deps.delay ?? sleep;
    const pause = deps.stageDelayMs ?? STATION.stageDelayMs;

    const location = parseLocation(form.latitude, form.longitude);

    deps.onStage?.("dispatched");
    await delay(pause);

    const { vehicle, officers } = pickVehicle(random);
    const route = routeFor(form.severity);
    const equipmentCounts = allocateEquipment(form.equipment, random);

    deps.onStage?.("on_scene");
    await delay(pause);

    const record = deps.history.append({
        incidentType: form.incidentType,
        location,
        locationText: `${form.latitude}, ${form.longitude}`,
        severity: form.severity,
        vehicle,
        officers,
        route: route.label,
        etaMinutes: route.etaMinutes,
        equipment: [...form.equipment],
        waterUsedLiters: form.waterUsedLiters,
    });

    deps.onStage?.("resolved");
    await delay(pause);

    const history = deps.history.all();
    const report = formatReport({
        incidentType: form.incidentType,
        severity: form.severity,
        latitude: form.latitude,
        longitude: form.longitude,
        vehicle,
        officers,
        route: route.label,
        etaMinutes: route.etaMinutes,
        equipment: form.equipment,
        waterUsedLiters: form.waterUsedLiters,
    });

    console.info(`[dispatch] ${vehicle} → ${location.lat}, ${location.lon} (${route.label}, ${route.etaMinutes} min)`);

    return {
        report,
        record,
        history,
        equipmentCounts,
        equipmentChart: equipmentChart(equipmentCounts),
        waterChart: waterChart(history),
        map: renderMap(location.lat, location.lon),
    };
}

/** Logs a failed dispatch and tells the user why; the caller keeps its old output. */
export function reportDispatchFailure(
    err: unknown,
    notify: (text: string, tone: "error") => void
): void {
    console.error("[dispatch]", err);
    notify(err instanceof CoercionError ? err.message : "Dispatch failed", "error");
}
