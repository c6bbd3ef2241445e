// lib/fountains/prepare.ts
//
// =============================================================================
// Préparation du jeu de fontaines.
//
// Étapes (dans l’ordre) :
//   1. affectation des valeurs positionnelles sur les champs nommés ;
//   2. valeurs manquantes : zone contrôlée → "non renseigné",
//      nom d’accès → "Non spécifié" (aucun autre défaut) ;
//   3. champs dérivés : type de ligne (Métro / RER), région (Paris / Banlieue) ;
//   4. tri lexical stable sur l’identifiant de ligne.
//
// Contraintes :
// - Fonction pure : l’entrée n’est jamais modifiée, la sortie est gelée.
// - Même entrée → même sortie (mêmes enregistrements, même ordre).
// - Un numérique illisible ne supprime pas la ligne : valeur `null` + ParseError
//   consignée dans le rapport.
// =============================================================================

import {
  ACCESS_UNSPECIFIED,
  RER_LINES,
  ZONE_UNSPECIFIED,
  type FountainDataset,
  type FountainRecord,
  type RawFountainRow,
  type Region,
  type TransitType,
} from "@/lib/types";
import { ParseError, assertWidth } from "@/lib/fountains/schema";

/* ───────── champs dérivés ───────── */

const RER = new Set<string>(RER_LINES);

export const transitTypeOf = (lineId: string): TransitType =>
  RER.has(lineId) ? "RER" : "Métro";

/** Code postal illisible (null) → "Banlieue". */
export const regionOf = (postalCode: number | null): Region =>
  postalCode !== null && postalCode >= 75000 && postalCode < 76000 ? "Paris" : "Banlieue";

/* ───────── lecture des numériques ───────── */

function toFloat(raw: string): number | null {
  if (raw.trim() === "") return null;
  const n = Number(raw);
  return Number.isFinite(n) ? n : null;
}

function toInt(raw: string): number | null {
  const n = toFloat(raw);
  return n !== null && Number.isInteger(n) ? n : null;
}

const orDefault = (raw: string, fallback: string) => (raw === "" ? fallback : raw);

/* ───────── tri ───────── */

// ordre des unités de code (équivalent ASCII pour les identifiants de ligne)
const lexical = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/* ───────── pipeline ───────── */

export type PrepareReport = {
  records: FountainDataset
  issues: ParseError[]
}

/**
 * Prépare les lignes brutes et renvoie aussi les problèmes de lecture.
 * `SchemaError` si une ligne n’a pas 13 valeurs.
 */
export function prepareWithReport(rawRows: readonly RawFountainRow[]): PrepareReport {
  const issues: ParseError[] = [];

  const records = rawRows.map((raw, i): Readonly<FountainRecord> => {
    const row = i + 1;
    assertWidth(raw, row);

    const [
      ratpId, lineId, station, lon, lat, externalId, address,
      postal, commune, accessNumber, accessName, zone, geoPoint,
    ] = raw;

    const longitude = toFloat(lon);
    const latitude = toFloat(lat);
    const postalCode = toInt(postal);
    if (longitude === null) issues.push(new ParseError("longitude", lon, row));
    if (latitude === null) issues.push(new ParseError("latitude", lat, row));
    if (postalCode === null) issues.push(new ParseError("postalCode", postal, row));

    return Object.freeze({
      ratpId,
      lineId,
      station,
      longitude,
      latitude,
      externalId,
      address,
      postalCode,
      commune,
      accessNumber,
      accessName: orDefault(accessName, ACCESS_UNSPECIFIED),
      controlledZoneStatus: orDefault(zone, ZONE_UNSPECIFIED),
      geoPoint,
      transitType: transitTypeOf(lineId),
      region: regionOf(postalCode),
    });
  });

  // Array.prototype.sort est stable : les égalités gardent l’ordre d’entrée
  records.sort((a, b) => lexical(a.lineId, b.lineId));

  return { records: Object.freeze(records), issues };
}

/** Jeu préparé seul (voir `prepareWithReport`). */
export function prepare(rawRows: readonly RawFountainRow[]): FountainDataset {
  return prepareWithReport(rawRows).records;
}
