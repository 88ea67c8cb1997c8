import type { Severity } from "@/types";

export const FORM_DEFAULTS: { severity: Severity; water: string } = {
    severity: "Medium",
    water: "500",
};

/** Water field text to litres; anything that isn't a number counts as 0. */
export function parseWaterLiters(raw: string): number {
    const liters = Number(raw);
    return Number.isFinite(liters) ? liters : 0;
}
