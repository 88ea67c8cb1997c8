import type { Route, Severity } from "@/types";

const ROUTES: Record<Severity, Route> = {
    High: { label: "Emergency Green Corridor", etaMinutes: 12 },
    Medium: { label: "Traffic-Aware City Route", etaMinutes: 18 },
    Low: { label: "Normal Shortest Route", etaMinutes: 25 },
};

// Anything that isn't High or Medium takes the normal route.
export function routeFor(severity: Severity | string): Route {
    if (severity === "High") return { ...ROUTES.High };
    if (severity === "Medium") return { ...ROUTES.Medium };
    return { ...ROUTES.Low };
}
