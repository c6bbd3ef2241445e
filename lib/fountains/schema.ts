// lib/fountains/schema.ts
//
// =============================================================================
// Contrat d’entrée du CSV "fontaines à eau dans le réseau RATP".
//
// Rôle :
// - Décrire explicitement les 13 colonnes attendues (ordre fixe) plutôt que
//   de renommer les colonnes "à l’aveugle" par position.
// - Décoder le texte CSV (séparateur `;`, BOM UTF-8 toléré) via papaparse.
// - Échouer tôt (`SchemaError`) si la largeur d’une ligne ne correspond pas :
//   aucun jeu partiel n’est produit.
//
// Les noms d’en-tête du fichier ne sont pas comparés : seul le nombre de
// colonnes compte, l’affectation se fait ensuite par position.
// =============================================================================

import * as Papa from "papaparse";
import type { RawFountainRow } from "@/lib/types";

/** Colonnes du fichier source, dans l’ordre. */
export const FOUNTAIN_COLUMNS = [
  "id_ratp",
  "ligne",
  "station",
  "longitude",
  "latitude",
  "id_idm",
  "adresse",
  "code_postal",
  "commune",
  "num_acces",
  "nom_acces",
  "zone_controlee",
  "point_geo",
] as const;

export type FountainColumn = (typeof FOUNTAIN_COLUMNS)[number];

/**
 * Le fichier (ou une ligne) n’a pas la forme attendue.
 * `row` vaut 0 pour l’en-tête, puis 1, 2… pour les lignes de données.
 */
export class SchemaError extends Error {
  expected: number;
  actual: number;
  row: number;
  constructor(expected: number, actual: number, row: number) {
    super(
      row === 0
        ? `en-tête : ${actual} colonnes au lieu de ${expected}`
        : `ligne ${row} : ${actual} colonnes au lieu de ${expected}`
    );
    this.name = "SchemaError";
    this.expected = expected;
    this.actual = actual;
    this.row = row;
  }
}

/** Un champ numérique n’a pas pu être lu. Non fatal : la ligne est gardée. */
export class ParseError extends Error {
  field: "postalCode" | "longitude" | "latitude";
  raw: string;
  row: number;
  constructor(field: ParseError["field"], raw: string, row: number) {
    super(`ligne ${row} : ${field} illisible (${JSON.stringify(raw)})`);
    this.name = "ParseError";
    this.field = field;
    this.raw = raw;
    this.row = row;
  }
}

/** Vérifie la largeur d’une ligne positionnelle. */
export function assertWidth(row: readonly unknown[], index: number): void {
  if (row.length !== FOUNTAIN_COLUMNS.length) {
    throw new SchemaError(FOUNTAIN_COLUMNS.length, row.length, index);
  }
}

/**
 * Décode le CSV et renvoie les lignes de données (en-tête retiré).
 *
 * - Lignes vides ignorées.
 * - Un fichier sans en-tête est traité comme une erreur de schéma.
 */
export function parseFountainsCsv(text: string): RawFountainRow[] {
  const input = text.replace(/^\uFEFF/, "");
  const res = Papa.parse<string[]>(input, {
    delimiter: ";",
    skipEmptyLines: true,
  });

  for (const e of res.errors) {
    console.warn("[schema] papaparse:", e.code, e.message, "row", e.row);
  }

  const [header, ...rows] = res.data;
  if (!header) throw new SchemaError(FOUNTAIN_COLUMNS.length, 0, 0);
  assertWidth(header, 0);

  rows.forEach((r, i) => assertWidth(r, i + 1));
  return rows;
}
