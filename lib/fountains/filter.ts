// lib/fountains/filter.ts
//
// =============================================================================
// Moteur de filtres + agrégats consommés par la page.
//
// Rôle :
// - `filterFountains` : applique la sélection courante (lignes, type, zone)
//   sur le jeu préparé. Recalculé à chaque interaction, sans état partagé.
// - Ordre "d’affichage" des lignes (légendes, axes) : 1, 1bis, 2, …, 14, A.
//   À ne pas confondre avec l’ordre lexical de chargement (1, 10, 11, …).
// - Comptages par ligne / par catégorie pour les graphiques.
//
// Aucune de ces fonctions ne lève : une sélection hors domaine renvoie
// simplement un résultat vide.
// =============================================================================

import {
  ALL,
  type CategoricalField,
  type FilterSelection,
  type FountainDataset,
  type FountainRecord,
} from "@/lib/types";

/* ───────────────────────── Ordre d’affichage ───────────────────────── */

export type LineSortKey = readonly [0, number] | readonly [1, string];

/**
 * Clé de tri d’une ligne :
 * - "7"    → [0, 7]
 * - "3bis" → [0, 3.5]
 * - "A"    → [1, "A"] (après toutes les lignes numériques)
 */
export function lineSortKey(lineId: string): LineSortKey {
  if (/^\d+$/.test(lineId)) return [0, parseInt(lineId, 10)];
  const bis = /^(\d+)bis$/.exec(lineId);
  if (bis) return [0, parseInt(bis[1], 10) + 0.5];
  return [1, lineId];
}

export function compareLines(a: string, b: string): number {
  const ka = lineSortKey(a);
  const kb = lineSortKey(b);
  if (ka[0] !== kb[0]) return ka[0] - kb[0];
  const [, va] = ka;
  const [, vb] = kb;
  if (typeof va === "number" && typeof vb === "number") return va - vb;
  const sa = String(va);
  const sb = String(vb);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

/** Lignes distinctes, dans l’ordre d’affichage. */
export function sortLines(lineIds: Iterable<string>): string[] {
  return Array.from(new Set(lineIds)).sort(compareLines);
}

/* ───────────────────────── Filtres ───────────────────────── */

/** Sélection par défaut : toutes les lignes présentes, aucun autre filtre. */
export function defaultSelection(dataset: FountainDataset): FilterSelection {
  return {
    lines: new Set(dataset.map((r) => r.lineId)),
    transitType: ALL,
    zoneStatus: ALL,
  };
}

/**
 * Sélection ouverte : `lines` absent, donc toutes les lignes, y compris
 * celles d’un jeu pas encore chargé. État initial de la page.
 */
export function openSelection(): Omit<FilterSelection, "lines"> {
  return { transitType: ALL, zoneStatus: ALL };
}

/**
 * Applique les prédicats en ET, dans l’ordre :
 *   1. appartenance à `lines` (absent → toutes),
 *   2. type de transport (sauté si "All"),
 *   3. statut de zone (sauté si "All").
 */
export function filterFountains(
  dataset: FountainDataset,
  selection: FilterSelection
): FountainDataset {
  const lines = selection.lines === undefined ? null : new Set(selection.lines);
  const { transitType, zoneStatus } = selection;

  let out = lines ? dataset.filter((r) => lines.has(r.lineId)) : dataset.slice();
  if (transitType !== ALL) out = out.filter((r) => r.transitType === transitType);
  if (zoneStatus !== ALL) out = out.filter((r) => r.controlledZoneStatus === zoneStatus);
  return out;
}

/* ───────────────────────── Agrégats ───────────────────────── */

/** Effectif par ligne, clés dans l’ordre d’affichage. */
export function countByLine(dataset: FountainDataset): Map<string, number> {
  const counts = new Map<string, number>();
  for (const r of dataset) counts.set(r.lineId, (counts.get(r.lineId) ?? 0) + 1);
  return new Map(sortLines(counts.keys()).map((k) => [k, counts.get(k) ?? 0]));
}

/** N lignes les mieux équipées ; à effectif égal, ordre d’affichage. */
export function topLines(dataset: FountainDataset, n = 10): [string, number][] {
  return Array.from(countByLine(dataset))
    .sort((a, b) => b[1] - a[1] || compareLines(a[0], b[0]))
    .slice(0, Math.max(0, n));
}

/**
 * Effectif par valeur d’un champ catégoriel.
 * Ordre : effectif décroissant, puis ordre de première apparition.
 */
export function countByCategory(
  dataset: FountainDataset,
  field: CategoricalField
): Map<string, number> {
  const counts = new Map<string, number>();
  for (const r of dataset) {
    const v = valueOf(r, field);
    counts.set(v, (counts.get(v) ?? 0) + 1);
  }
  // tri stable : les égalités gardent l’ordre d’insertion (première apparition)
  return new Map(Array.from(counts).sort((a, b) => b[1] - a[1]));
}

function valueOf(r: Readonly<FountainRecord>, field: CategoricalField): string {
  return r[field];
}
