// lib/services/fountains.ts
//
// =============================================================================
// Service frontend : récupère le jeu préparé exposé par `GET /api/fountains`.
//
// Rôle :
// - Appeler l’endpoint via `lib/http.ts`.
// - Vérifier la forme du payload et renormaliser chaque ligne vers
//   `FountainRecord` (les champs dérivés viennent du serveur, on ne les
//   recalcule pas ici).
// - Renvoyer un jeu gelé, prêt pour les filtres.
//
// Pas de dépendance à React : service pur. Les erreurs réseau remontent à
// l’appelant (le hook affiche le message).
// =============================================================================

import { getJSON } from "@/lib/http";
import type {
  FountainDataset,
  FountainRecord,
  ParseIssue,
  Region,
  TransitType,
} from "@/lib/types";

export type FountainsPayload = {
  generatedAt: string | null
  source: string
  issues: ParseIssue[]
  records: FountainDataset
}

/* ------------------------------------------------------------------------- */
/* Utils                                                                     */
/* ------------------------------------------------------------------------- */

type Obj = Record<string, unknown>;

const isObj = (x: unknown): x is Obj => typeof x === "object" && x !== null && !Array.isArray(x);

const str = (x: unknown): string => (typeof x === "string" ? x : x == null ? "" : String(x));

/** number fini ou null (jamais NaN). */
function toNum(x: unknown): number | null {
  if (typeof x === "number" && Number.isFinite(x)) return x;
  if (typeof x === "string" && x.trim() !== "") {
    const n = Number(x);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

const toTransitType = (x: unknown): TransitType => (x === "RER" ? "RER" : "Métro");
const toRegion = (x: unknown): Region => (x === "Paris" ? "Paris" : "Banlieue");

function toRecord(r: Obj): Readonly<FountainRecord> {
  return Object.freeze({
    ratpId: str(r.ratpId),
    lineId: str(r.lineId),
    station: str(r.station),
    longitude: toNum(r.longitude),
    latitude: toNum(r.latitude),
    externalId: str(r.externalId),
    address: str(r.address),
    postalCode: toNum(r.postalCode),
    commune: str(r.commune),
    accessNumber: str(r.accessNumber),
    accessName: str(r.accessName),
    controlledZoneStatus: str(r.controlledZoneStatus),
    geoPoint: str(r.geoPoint),
    transitType: toTransitType(r.transitType),
    region: toRegion(r.region),
  });
}

function toIssue(x: unknown): ParseIssue | null {
  if (!isObj(x)) return null;
  const { field } = x;
  if (field !== "postalCode" && field !== "longitude" && field !== "latitude") return null;
  return { field, row: toNum(x.row) ?? 0, raw: str(x.raw) };
}

/* ------------------------------------------------------------------------- */
/* Service principal                                                         */
/* ------------------------------------------------------------------------- */

/**
 * Charge le jeu de fontaines.
 *
 * - L’ordre des lignes renvoyé par le serveur (tri lexical) est conservé.
 * - Les entrées qui ne sont pas des objets ou sans `lineId` sont ignorées.
 * - Payload inattendu → `Error` explicite.
 */
export async function getFountains(): Promise<FountainsPayload> {
  const payload = await getJSON<unknown>("/fountains");
  if (!isObj(payload) || !Array.isArray(payload.rows)) {
    throw new Error("Réponse /fountains inattendue");
  }

  const records = payload.rows
    .filter(isObj)
    .map(toRecord)
    .filter((r) => r.lineId !== "");

  const issues = Array.isArray(payload.issues)
    ? payload.issues.map(toIssue).filter((i): i is ParseIssue => i !== null)
    : [];

  return {
    generatedAt: typeof payload.generated_at === "string" ? payload.generated_at : null,
    source: str(payload.source),
    issues,
    records: Object.freeze(records),
  };
}
