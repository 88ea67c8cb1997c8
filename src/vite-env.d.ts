/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_STATION_LAT?: string;
  readonly VITE_STATION_LON?: string;
  readonly VITE_STAGE_DELAY_MS?: string;
  readonly VITE_TILE_URL?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
