// pages/api/revalidate.ts
//
// =============================================================================
// POST /api/revalidate : invalidation explicite du jeu en cache.
// -----------------------------------------------------------------------------
// Le jeu de fontaines est gardé en mémoire pour la durée du process. Cette
// route force sa relecture (CSV remplacé sans changement de mtime, par
// exemple) puis renvoie le nombre de lignes rechargées.
//
// Sécurité :
//   - secret uniquement via l’en-tête `x-revalidate-secret` (jamais en query),
//     pour qu’il n’apparaisse pas dans les URLs / logs ;
//   - sans `REVALIDATE_SECRET` configuré, toute tentative échoue (401).
// =============================================================================

import type { NextApiRequest, NextApiResponse } from "next";
import { revalidateRoute } from "@/lib/server/routes";

export default async function handler(req: NextApiRequest, res: NextApiResponse) {
  // Chaque appel doit toucher le serveur
  res.setHeader("Cache-Control", "no-store, private, max-age=0");

  const { status, body, headers } = await revalidateRoute(
    req.method,
    req.headers["x-revalidate-secret"]
  );
  for (const [k, v] of Object.entries(headers ?? {})) res.setHeader(k, v);
  return res.status(status).json(body);
}
