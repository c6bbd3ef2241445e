// lib/server/routes.ts
//
// =============================================================================
// Logique des routes API, séparée des handlers Next.js pour être testable
// sans serveur : chaque fonction renvoie `{ status, body }`, le handler se
// contente de l’écrire dans la réponse.
// =============================================================================

import path from "path";

import type { FountainsResponse } from "@/lib/types";
import { SchemaError } from "@/lib/fountains/schema";
import { invalidateFountains, loadFountains } from "@/lib/server/dataset";

export type ErrorBody = { ok: false; error: string };

export type RouteResult<T> = {
  status: number
  body: T | ErrorBody
  headers?: Record<string, string>
}

const methodNotAllowed = (allow: string): RouteResult<never> => ({
  status: 405,
  body: { ok: false, error: "Method not allowed" },
  headers: { Allow: allow },
});

/* ───────── GET /api/fountains ───────── */

/**
 * - `SchemaError` (CSV mal formé) → 500 avec message explicite ;
 * - fichier introuvable ou autre erreur → 500 générique.
 */
export async function fountainsRoute(
  method: string | undefined,
  csvPath?: string
): Promise<RouteResult<FountainsResponse>> {
  if (method !== "GET") return methodNotAllowed("GET");

  try {
    const ds = await loadFountains(csvPath);
    return {
      status: 200,
      body: {
        generated_at: ds.loadedAt,
        // nom du fichier seul : le chemin serveur ne sort pas
        source: path.basename(ds.source),
        count: ds.records.length,
        issues: ds.issues.map((e) => ({ row: e.row, field: e.field, raw: e.raw })),
        rows: [...ds.records],
      },
    };
  } catch (e) {
    if (e instanceof SchemaError) {
      console.error("[api/fountains] schema:", e.message);
      return { status: 500, body: { ok: false, error: `CSV invalide — ${e.message}` } };
    }
    console.error("[api/fountains] load failed:", e);
    return { status: 500, body: { ok: false, error: "Jeu de données indisponible" } };
  }
}

/* ───────── POST /api/revalidate ───────── */

export type RevalidateBody = { ok: true; count: number; issues: number; loaded_at: string };

/**
 * Invalide puis recharge le jeu.
 *
 * - secret attendu dans `x-revalidate-secret` ; sans `REVALIDATE_SECRET`
 *   configuré la route refuse tout (401), message générique ;
 * - le secret est relu à chaque appel.
 */
export async function revalidateRoute(
  method: string | undefined,
  token: string | string[] | undefined,
  csvPath?: string
): Promise<RouteResult<RevalidateBody>> {
  if (method !== "POST") return methodNotAllowed("POST");

  const secret = process.env.REVALIDATE_SECRET || "";
  if (!secret || typeof token !== "string" || token !== secret) {
    return { status: 401, body: { ok: false, error: "Unauthorized" } };
  }

  invalidateFountains();

  try {
    const ds = await loadFountains(csvPath);
    return {
      status: 200,
      body: { ok: true, count: ds.records.length, issues: ds.issues.length, loaded_at: ds.loadedAt },
    };
  } catch (e) {
    console.error("[api/revalidate] reload failed:", e);
    const error = e instanceof SchemaError ? `CSV invalide — ${e.message}` : "Rechargement impossible";
    return { status: 500, body: { ok: false, error } };
  }
}
