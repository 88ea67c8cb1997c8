export type Severity = "Low" | "Medium" | "High";

export const SEVERITIES: readonly Severity[] = ["Low", "Medium", "High"];

export type LatLon = { lat: number; lon: number };

/** What the incident form hands to a dispatch. Coordinates stay as typed. */
export type DispatchForm = {
    incidentType: string;
    severity: Severity | string;
    latitude: string | number;
    longitude: string | number;
    equipment: string[];
    waterUsedLiters: number;
};

export type IncidentRecord = {
    incidentType: string;
    location: LatLon;
    // Location exactly as entered, shown in the history table
    locationText: string;
    severity: Severity | string;
    vehicle: string;
    officers: readonly string[];
    route: string;
    etaMinutes: number;
    equipment: readonly string[];
    waterUsedLiters: number;
};

export type Route = { label: string; etaMinutes: number };

export type Stage = "dispatched" | "on_scene" | "resolved";

/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

export type Delay = (ms: number) => Promise<void>;
