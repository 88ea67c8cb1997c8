import { describe, expect, it } from "vitest";
import type { IncidentRecord } from "@/types";
import { equipmentChart, waterChart } from "@/lib/charts";

function withWater(waterUsedLiters: number): IncidentRecord {
    return {
        incidentType: "Road Accident",
        location: { lat: 12.97, lon: 77.59 },
        locationText: "12.97, 77.59",
        severity: "Low",
        vehicle: "🚑 Rescue Van 1",
        officers: ["Officer F", "Officer G"],
        route: "Normal Shortest Route",
        etaMinutes: 25,
        equipment: [],
        waterUsedLiters,
    };
}

describe("equipmentChart", () => {
    it("draws axes without bars for an empty selection", () => {
        const chart = equipmentChart({});
        expect(chart.kind).toBe("bars");
        expect(chart.bars).toEqual([]);
        expect(chart.yTicks).toEqual([
            { y: 258, value: 0 },
            { y: 42, value: 1 },
        ]);
        expect(chart.title).toBe("🧰 Equipment Usage");
        expect(chart.yLabel).toBe("Units Used");
    });

    it("scales bars against the largest count", () => {
        const chart = equipmentChart({ "💧 Water Hose": 2, "🫁 Oxygen Cylinder": 3 });
        expect(chart.bars.map((b) => b.label)).toEqual(["💧 Water Hose", "🫁 Oxygen Cylinder"]);
        const [hose, oxygen] = chart.bars;
        expect(oxygen.height).toBe(216);
        expect(oxygen.y).toBe(42);
        expect(hose.height).toBeCloseTo(144);
        expect(hose.y).toBeCloseTo(114);
        expect(hose.x).toBeCloseTo(62.8);
        expect(hose.width).toBeCloseTo(166.4);
        expect(chart.yTicks.map((t) => t.value)).toEqual([0, 1, 2, 3]);
    });
});

describe("waterChart", () => {
    it("shows a placeholder before any incident", () => {
        expect(waterChart([])).toEqual({ kind: "placeholder", W: 500, H: 300, text: "No Incidents Yet" });
    });

    it("draws one bar per incident, indexed from zero", () => {
        const chart = waterChart([withWater(500), withWater(250)]);
        if (chart.kind !== "bars") throw new Error("expected bars");
        expect(chart.bars.map((b) => [b.label, b.value])).toEqual([
            ["0", 500],
            ["1", 250],
        ]);
        expect(chart.xLabel).toBe("Incident #");
        expect(chart.yLabel).toBe("Liters");
        expect(chart.bars[1].height).toBeCloseTo(108);
        expect(chart.yTicks.map((t) => t.value)).toEqual([0, 100, 200, 300, 400, 500]);
    });

    it("keeps negative volumes on the baseline", () => {
        const chart = waterChart([withWater(-20), withWater(10)]);
        if (chart.kind !== "bars") throw new Error("expected bars");
        expect(chart.bars[0].height).toBe(0);
        expect(chart.bars[0].value).toBe(-20);
    });
});
