// lib/server/dataset.ts
//
// =============================================================================
// Jeu de fontaines côté serveur : chargé une fois, partagé en lecture seule.
//
// Rôle :
// - Lire le CSV (`FOUNTAINS_CSV_PATH`, défaut `data/fontaines.csv`), le
//   décoder puis le préparer.
// - Mémoriser le résultat pour la durée du process, avec la "version" du
//   fichier (mtime + taille). Une nouvelle version est rechargée au prochain
//   appel ; `invalidateFountains()` force le rechargement.
// - Une `SchemaError` remonte telle quelle : rien n’est mis en cache.
//
// Node uniquement (fs) : à n’importer que depuis les routes API.
// =============================================================================

import { promises as fs } from "fs";
import path from "path";

import type { FountainDataset } from "@/lib/types";
import { parseFountainsCsv, type ParseError } from "@/lib/fountains/schema";
import { prepareWithReport } from "@/lib/fountains/prepare";

export const DEFAULT_CSV_PATH = "data/fontaines.csv";

/** Chemin du CSV, relatif au répertoire de lancement si non absolu. */
export function resolveCsvPath(p = process.env.FOUNTAINS_CSV_PATH?.trim() || DEFAULT_CSV_PATH) {
  return path.isAbsolute(p) ? p : path.resolve(process.cwd(), p);
}

export type LoadedDataset = {
  records: FountainDataset
  issues: ParseError[]
  source: string
  version: string
  loadedAt: string      // ISO
}

let cache: LoadedDataset | null = null;

const versionOf = (st: { mtimeMs: number; size: number }) => `${st.mtimeMs}:${st.size}`;

/**
 * Renvoie le jeu préparé (depuis le cache si le fichier n’a pas changé).
 *
 * - `csvPath` : surcharge du chemin (tests, scripts).
 */
export async function loadFountains(csvPath?: string): Promise<LoadedDataset> {
  const source = resolveCsvPath(csvPath);
  const version = versionOf(await fs.stat(source));

  if (cache && cache.source === source && cache.version === version) return cache;

  const text = await fs.readFile(source, "utf-8");
  const { records, issues } = prepareWithReport(parseFountainsCsv(text));

  for (const issue of issues) console.warn("[dataset]", issue.message);
  console.log(`[dataset] ${records.length} fontaines chargées depuis ${source}`);

  cache = { records, issues, source, version, loadedAt: new Date().toISOString() };
  return cache;
}

/** Oublie le jeu en cache ; le prochain `loadFountains` relira le fichier. */
export function invalidateFountains(): void {
  if (cache) console.log("[dataset] cache invalidé");
  cache = null;
}
