// lib/fountains/insights.ts
//
// Indicateurs de synthèse affichés en tête de dashboard et dans l’onglet
// "Analyses détaillées" (KPIs + enseignements chiffrés).

import { RER_LINES, ZONE_CONTROLLED, type FountainDataset } from "@/lib/types";
import { countByLine, sortLines } from "@/lib/fountains/filter";

export type FountainsSummary = {
  total: number
  lines: number
  communes: number
  controlled: number
  /** Part en zone contrôlée (0..100), null si jeu vide. */
  controlledPct: number | null
  paris: number
  suburbs: number
  /** Lignes les plus représentées (effectif décroissant, puis ordre d’affichage). */
  topLines: string[]
  rerLines: string[]
  rerCount: number
}

export function summarize(dataset: FountainDataset, topN = 4): FountainsSummary {
  const total = dataset.length;
  const controlled = dataset.filter((r) => r.controlledZoneStatus === ZONE_CONTROLLED).length;
  const paris = dataset.filter((r) => r.region === "Paris").length;
  const rer = dataset.filter((r) => r.transitType === "RER");

  const top = Array.from(countByLine(dataset))
    .sort((a, b) => b[1] - a[1])
    .slice(0, topN)
    .map(([line]) => line);

  return {
    total,
    lines: new Set(dataset.map((r) => r.lineId)).size,
    communes: new Set(dataset.map((r) => r.commune)).size,
    controlled,
    controlledPct: total ? (controlled / total) * 100 : null,
    paris,
    suburbs: total - paris,
    topLines: top,
    rerLines: sortLines(rer.map((r) => r.lineId)),
    rerCount: rer.length,
  };
}

/**
 * Options du multi-sélecteur de lignes.
 * Ordre lexical, comme l’ordre de chargement du jeu.
 */
export function uniqueLineOptions(dataset: FountainDataset): string[] {
  return Array.from(new Set(dataset.map((r) => r.lineId))).sort();
}

/**
 * Note sous le graphique Métro vs RER : lignes RER présentes dans le jeu,
 * les autres lignes RER étant signalées comme absentes des données.
 */
export function rerNote(summary: Pick<FountainsSummary, "rerLines" | "rerCount">): string {
  const { rerLines, rerCount } = summary;
  if (!rerLines.length) return "Aucune ligne RER n’est représentée dans ce jeu de données.";

  const many = rerLines.length > 1;
  const names = rerLines.map((l) => `RER ${l}`).join(", ");
  const head = many
    ? `Dans ce jeu de données, seules les lignes ${names} sont représentées`
    : `Dans ce jeu de données, seule la ligne ${names} est représentée`;
  const count = `${rerCount} fontaine${rerCount > 1 ? "s" : ""}`;

  const missing = RER_LINES.filter((l) => !rerLines.includes(l));
  const tail = missing.length
    ? ` Les autres lignes RER (${missing.join(", ")}) ne figurent pas dans les données disponibles.`
    : "";
  return `${head} (${count}).${tail}`;
}
