import type { LatLon } from "@/types";
import STATION, { type StationConfig } from "@/config/station";
import { CoercionError, type CoordinateField } from "@/lib/errors";

export type MapMarker = {
    id: "station" | "incident";
    position: LatLon;
    tooltip: string;
    color: string;
};

export type MapPath = {
    points: LatLon[];
    color: string;
    weight: number;
    animated: boolean;
};

export type MapDocument = {
    center: LatLon;
    zoom: number;
    tileUrl: string;
    markers: MapMarker[];
    paths: MapPath[];
};

// Plain decimal or exponent notation; no hex, binary or octal prefixes.
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseCoordinate(field: CoordinateField, raw: string | number): number {
    if (typeof raw === "number") {
        if (!Number.isFinite(raw)) throw new CoercionError(field, raw);
        return raw;
    }
    const text = raw.trim();
    if (!DECIMAL.test(text)) throw new CoercionError(field, raw);
    const n = Number(text);
    if (!Number.isFinite(n)) throw new CoercionError(field, raw);
    return n;
}

export function parseLocation(lat: string | number, lon: string | number): LatLon {
    return { lat: parseCoordinate("latitude", lat), lon: parseCoordinate("longitude", lon) };
}

/** Station marker, incident marker and the route between them. */
export function renderMap(
    lat: string | number,
    lon: string | number,
    station: StationConfig = STATION
): MapDocument {
    const target = parseLocation(lat, lon);
    const origin = { ...station.location };
    return {
        center: origin,
        zoom: station.zoom,
        tileUrl: station.tileUrl,
        markers: [
            { id: "station", position: origin, tooltip: station.name, color: "green" },
            { id: "incident", position: target, tooltip: "Incident Location", color: "red" },
        ],
        paths: [{ points: [origin, target], color: "red", weight: 5, animated: true }],
    };
}

const LEAFLET_CDN = "https://unpkg.com/leaflet@1.9.4/dist";

// JSON inside <script> must not be able to close the tag.
function scriptJson(value: unknown): string {
    return JSON.stringify(value).replace(/</g, "\\u003c");
}

/** Standalone Leaflet page for the document, suitable for saving or an iframe. */
export function mapDocumentToHtml(doc: MapDocument): string {
    return `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8" />
<title>Vehicle Movement Map</title>
<link rel="stylesheet" href="${LEAFLET_CDN}/leaflet.css" />
<script src="${LEAFLET_CDN}/leaflet.js"></script>
<style>
html, body, #map { height: 100%; margin: 0; }
.ant-path { stroke-dasharray: 10 20; animation: ant-march 1s linear infinite; }
@keyframes ant-march { from { stroke-dashoffset: 30; } to { stroke-dashoffset: 0; } }
</style>
</head>
<body>
<div id="map"></div>
<script>
const doc = ${scriptJson(doc)};
const map = L.map("map").setView([doc.center.lat, doc.center.lon], doc.zoom);
L.tileLayer(doc.tileUrl).addTo(map);
for (const p of doc.paths) {
  L.polyline(p.points.map((q) => [q.lat, q.lon]), {
    color: p.color, weight: p.weight, className: p.animated ? "ant-path" : undefined,
  }).addTo(map);
}
for (const m of doc.markers) {
  L.circleMarker([m.position.lat, m.position.lon], { color: m.color, fillOpacity: 0.8, radius: 9 })
    .bindTooltip(m.tooltip)
    .addTo(map);
}
</script>
</body>
</html>
`;
}
