// pages/api/fountains.ts
//
// GET /api/fountains : jeu de fontaines préparé (JSON), servi depuis le cache
// process. Logique : `lib/server/routes.ts`.

import type { NextApiRequest, NextApiResponse } from "next";
import { fountainsRoute } from "@/lib/server/routes";

export default async function handler(req: NextApiRequest, res: NextApiResponse) {
  res.setHeader("Cache-Control", "no-store");
  const { status, body, headers } = await fountainsRoute(req.method);
  for (const [k, v] of Object.entries(headers ?? {})) res.setHeader(k, v);
  return res.status(status).json(body);
}
