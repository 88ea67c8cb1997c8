// Central station configuration used throughout the dashboard.
// Values come from VITE_* env vars with the defaults below.

import type { LatLon } from "@/types";

function numberEnv(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    console.warn(`[config] ignoring non-numeric value "${raw}", using ${fallback}`);
    return fallback;
  }
  return n;
}

export type StationConfig = {
  name: string;
  location: LatLon;
  zoom: number;
  stageDelayMs: number;
  tileUrl: string;
};

const env = import.meta.env;

export const STATION: StationConfig = {
  name: "Fire Station",
  location: {
    lat: numberEnv(env.VITE_STATION_LAT, 12.9716),
    lon: numberEnv(env.VITE_STATION_LON, 77.5946),
  },
  zoom: 13,
  stageDelayMs: numberEnv(env.VITE_STAGE_DELAY_MS, 1000),
  tileUrl: env.VITE_TILE_URL || "https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png",
};

export default STATION;
