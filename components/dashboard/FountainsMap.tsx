// components/dashboard/FountainsMap.tsx
//
// =============================================================================
// Carte Leaflet des fontaines (client uniquement).
//
// - Un `CircleMarker` par fontaine géolocalisée, couleur de sa ligne ;
// - popup : station, ligne, adresse, commune, zone ;
// - `FitBounds` recadre la vue à chaque changement de filtre ;
// - légende des lignes présentes, ordre d’affichage.
//
// À charger via `next/dynamic` avec `ssr: false` (Leaflet touche `window`).
// =============================================================================

import { useEffect, useMemo } from "react";
import { CircleMarker, MapContainer, Popup, TileLayer, ZoomControl, useMap } from "react-leaflet";

import type { FountainDataset } from "@/lib/types";
import { mapBounds, mapLegend, mapPoints, type LatLngBounds } from "@/lib/fountains/mapPoints";

/** Centre de Paris, utilisé tant qu’aucun point n’est affiché. */
const PARIS_CENTER: [number, number] = [48.8566, 2.3522];

function FitBounds({ bounds }: { bounds: LatLngBounds | null }) {
  const map = useMap();
  useEffect(() => {
    if (!bounds) return;
    map.fitBounds(bounds, { padding: [20, 20], maxZoom: 15 });
  }, [bounds, map]);
  return null;
}

export type FountainsMapProps = {
  rows: FountainDataset
  height?: number
}

export default function FountainsMap({ rows, height = 600 }: FountainsMapProps) {
  const points = useMemo(() => mapPoints(rows), [rows]);
  const bounds = useMemo(() => mapBounds(points), [points]);
  const legend = useMemo(() => mapLegend(points), [points]);

  return (
    <div className="map-card" style={{ height }}>
      <MapContainer
        center={PARIS_CENTER}
        zoom={11}
        zoomControl={false}
        scrollWheelZoom={false}
        preferCanvas
        className="map-fill"
      >
        {/* Fond de carte (CartoDB light) */}
        <TileLayer
          attribution="&copy; OpenStreetMap contributors & CartoDB"
          url="https://{s}.basemaps.cartocdn.com/light_all/{z}/{x}/{y}{r}.png"
        />
        <ZoomControl position="bottomright" />

        {points.map((p, i) => (
          <CircleMarker
            key={`${p.ratpId}-${i}`}
            center={[p.lat, p.lon]}
            radius={7}
            pathOptions={{ color: "#ffffff", weight: 1, fillColor: p.color, fillOpacity: 0.9 }}
          >
            <Popup>
              <strong>{p.station}</strong>
              <br />
              Ligne : {p.lineId}
              <br />
              {p.address}, {p.commune}
              <br />
              Zone : {p.zone}
            </Popup>
          </CircleMarker>
        ))}

        <FitBounds bounds={bounds} />
      </MapContainer>

      {legend.length > 0 && (
        <ul className="map-legend" aria-label="Légende des lignes">
          {legend.map((l) => (
            <li key={l.lineId}>
              <span className="map-legend__dot" style={{ background: l.color }} aria-hidden="true" />
              {l.lineId} <span className="muted">({l.count})</span>
            </li>
          ))}
        </ul>
      )}
    </div>
  );
}
