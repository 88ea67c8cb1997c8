import type { IncidentRecord } from "@/types";

export type Bar = {
    label: string;
    value: number;
    x: number;
    y: number;
    width: number;
    height: number;
};

export type BarChartLayout = {
    kind: "bars";
    title: string;
    xLabel?: string;
    yLabel: string;
    color: string;
    W: number;
    H: number;
    P: number;
    innerW: number;
    innerH: number;
    bars: Bar[];
    yTicks: { y: number; value: number }[];
};

export type PlaceholderLayout = {
    kind: "placeholder";
    W: number;
    H: number;
    text: string;
};

export type ChartLayout = BarChartLayout | PlaceholderLayout;

const W = 500, H = 300, P = 42; // width, height, padding

function niceStep(max: number): number {
    return Math.max(1, Math.ceil(max / 5));
}

function barLayout(
    entries: { label: string; value: number }[],
    opts: { title: string; yLabel: string; xLabel?: string; color: string }
): BarChartLayout {
    const innerW = W - P * 2;
    const innerH = H - P * 2;
    const values = entries.map((e) => (Number.isFinite(e.value) ? Math.max(0, e.value) : 0));
    const step = niceStep(Math.max(0, ...values));
    const top = Math.max(step, step * Math.ceil(Math.max(0, ...values) / step));

    const slot = entries.length ? innerW / entries.length : innerW;
    const bars = entries.map((e, i) => {
        const height = (values[i] / top) * innerH;
        return {
            label: e.label,
            value: e.value,
            x: P + i * slot + slot * 0.1,
            y: P + innerH - height,
            width: slot * 0.8,
            height,
        };
    });

    const yTicks: { y: number; value: number }[] = [];
    for (let v = 0; v <= top; v += step) {
        yTicks.push({ y: P + innerH - (v / top) * innerH, value: v });
    }

    return { kind: "bars", ...opts, W, H, P, innerW, innerH, bars, yTicks };
}

/** One bar per equipment item; an empty selection still draws the axes. */
export function equipmentChart(counts: Record<string, number>): BarChartLayout {
    return barLayout(
        Object.entries(counts).map(([label, value]) => ({ label, value })),
        { title: "🧰 Equipment Usage", yLabel: "Units Used", color: "tomato" }
    );
}

export function waterChart(history: readonly IncidentRecord[]): ChartLayout {
    if (history.length === 0) {
        return { kind: "placeholder", W, H, text: "No Incidents Yet" };
    }
    return barLayout(
        history.map((r, i) => ({ label: String(i), value: r.waterUsedLiters })),
        { title: "💧 Water Usage per Incident", yLabel: "Liters", xLabel: "Incident #", color: "blue" }
    );
}
