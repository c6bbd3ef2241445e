// lib/fountains/mapPoints.ts
//
// =============================================================================
// Données de la carte, indépendantes de Leaflet.
//
// - `mapPoints`  : fontaines géolocalisées (lat/lon non nuls) + couleur ;
// - `mapBounds`  : emprise englobante, `null` si aucun point ;
// - `mapLegend`  : une entrée par ligne présente, ordre d’affichage.
// =============================================================================

import type { FountainDataset } from "@/lib/types";
import { compareLines } from "@/lib/fountains/filter";
import { lineColor } from "@/lib/fountains/lineColors";

export type MapPoint = {
  ratpId: string
  lineId: string
  station: string
  address: string
  commune: string
  zone: string
  lat: number
  lon: number
  color: string
}

export type LatLngBounds = [[number, number], [number, number]];

export type LegendEntry = { lineId: string; color: string; count: number };

export function mapPoints(dataset: FountainDataset): MapPoint[] {
  const out: MapPoint[] = [];
  for (const r of dataset) {
    if (r.latitude === null || r.longitude === null) continue;
    out.push({
      ratpId: r.ratpId,
      lineId: r.lineId,
      station: r.station,
      address: r.address,
      commune: r.commune,
      zone: r.controlledZoneStatus,
      lat: r.latitude,
      lon: r.longitude,
      color: lineColor(r.lineId),
    });
  }
  return out;
}

export function mapBounds(points: readonly MapPoint[]): LatLngBounds | null {
  if (!points.length) return null;
  let minLat = 90, maxLat = -90, minLon = 180, maxLon = -180;
  for (const p of points) {
    if (p.lat < minLat) minLat = p.lat;
    if (p.lat > maxLat) maxLat = p.lat;
    if (p.lon < minLon) minLon = p.lon;
    if (p.lon > maxLon) maxLon = p.lon;
  }
  return [
    [minLat, minLon],
    [maxLat, maxLon],
  ];
}

export function mapLegend(points: readonly MapPoint[]): LegendEntry[] {
  const counts = new Map<string, number>();
  for (const p of points) counts.set(p.lineId, (counts.get(p.lineId) ?? 0) + 1);
  return [...counts.keys()]
    .sort(compareLines)
    .map((lineId) => ({ lineId, color: lineColor(lineId), count: counts.get(lineId) ?? 0 }));
}
