// Lignes brutes de test (13 colonnes, ordre du CSV source).

import type { RawFountainRow } from "@/lib/types";

type RowOpts = {
  id?: string
  line: string
  station?: string
  lon?: string
  lat?: string
  postal?: string
  commune?: string
  accessName?: string
  zone?: string
}

export function rawRow({
  id = "f-00",
  line,
  station = "Station test",
  lon = "2.35",
  lat = "48.85",
  postal = "75001",
  commune = "Paris",
  accessName = "Accès 1",
  zone = "en zone contrôlée",
}: RowOpts): RawFountainRow {
  return [
    id, line, station, lon, lat, "70000", "1 rue de Test", postal,
    commune, "1", accessName, zone, `${lat}, ${lon}`,
  ];
}

/** Jeu varié : métro, "bis", RER, Paris et banlieue, zones mixtes. */
export const MIXED_ROWS: RawFountainRow[] = [
  rawRow({ id: "f-01", line: "2", postal: "75017", zone: "en zone contrôlée" }),
  rawRow({ id: "f-02", line: "10", postal: "75005", zone: "" }),
  rawRow({ id: "f-03", line: "1", postal: "92200", commune: "Neuilly-sur-Seine", zone: "en zone contrôlée" }),
  rawRow({ id: "f-04", line: "A", postal: "94300", commune: "Vincennes", zone: "" }),
  rawRow({ id: "f-05", line: "3bis", postal: "75020", zone: "en zone contrôlée" }),
  rawRow({ id: "f-06", line: "2", postal: "75018", zone: "" }),
  rawRow({ id: "f-07", line: "A", postal: "75012", zone: "en zone contrôlée" }),
  rawRow({ id: "f-08", line: "1", postal: "75008", zone: "en zone contrôlée" }),
];
