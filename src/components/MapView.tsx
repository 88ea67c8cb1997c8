import { useEffect } from "react";
import { MapContainer, TileLayer, CircleMarker, Polyline, Tooltip, useMap } from "react-leaflet";
import type { LatLngExpression, LatLngBoundsLiteral } from "leaflet";
import type { LatLon } from "@/types";
import type { MapDocument } from "@/lib/map";
import STATION from "@/config/station";

const toLatLng = (p: LatLon): [number, number] => [p.lat, p.lon];

// Keep station and incident both in view whenever a new route comes in
function FitRoute({ doc }: { doc: MapDocument }) {
  const map = useMap();
  useEffect(() => {
    const pts = doc.markers.map((m) => toLatLng(m.position));
    if (pts.length < 2) {
      map.setView(toLatLng(doc.center) as LatLngExpression, doc.zoom);
      return;
    }
    const bounds: LatLngBoundsLiteral = [
      [Math.min(...pts.map((p) => p[0])), Math.min(...pts.map((p) => p[1]))],
      [Math.max(...pts.map((p) => p[0])), Math.max(...pts.map((p) => p[1]))],
    ];
    map.fitBounds(bounds, { padding: [40, 40], maxZoom: doc.zoom });
  }, [doc, map]);
  return null;
}

export default function MapView({ doc }: { doc?: MapDocument }) {
  const center = toLatLng(doc?.center ?? STATION.location) as LatLngExpression;

  return (
    <div className="h-[320px] rounded-xl overflow-hidden border relative z-0">
      <MapContainer center={center} zoom={doc?.zoom ?? STATION.zoom} scrollWheelZoom className="h-full w-full">
        <TileLayer url={doc?.tileUrl ?? STATION.tileUrl} />
        {doc && <FitRoute doc={doc} />}

        {doc?.paths.map((p, i) => (
          <Polyline
            key={`path-${i}`}
            positions={p.points.map(toLatLng)}
            pathOptions={{ color: p.color, weight: p.weight, className: p.animated ? "ant-path" : undefined }}
          />
        ))}

        {doc?.markers.map((m) => (
          <CircleMarker
            key={m.id}
            center={toLatLng(m.position)}
            radius={9}
            pathOptions={{ color: m.color, fillOpacity: 0.8 }}
          >
            <Tooltip>{m.tooltip}</Tooltip>
          </CircleMarker>
        ))}
      </MapContainer>
    </div>
  );
}
