// lib/http.ts
//
// =============================================================================
// Utilitaires HTTP centralisés pour le frontend du dashboard.
//
// Rôle :
// - Centraliser la logique réseau : base URL, timeout, retry sur abort,
//   parsing JSON et erreurs typées.
// - Fournir une API minimale (`json`, `getJSON`) consommée par
//   les services (`lib/services/*`).
//
// Contraintes :
// - Aucune dépendance à React ou au DOM : module utilitaire pur.
// - Base URL surchargeable par `NEXT_PUBLIC_API_BASE` (défaut : routes API
//   Next.js locales, `/api`).
// =============================================================================

/*─────────────────────────────── Base URL ───────────────────────────────*/

function joinUrl(base: string, path: string) {
  const b = base.replace(/\/+$/, "");
  const p = path.replace(/^\/+/, "");
  return `${b}/${p}`;
}

export const API_BASE: string =
  (process.env.NEXT_PUBLIC_API_BASE && process.env.NEXT_PUBLIC_API_BASE.trim()) || "/api";

// Timeout HTTP par défaut (en millisecondes)
export const DEFAULT_TIMEOUT_MS = Number(
  process.env.NEXT_PUBLIC_HTTP_TIMEOUT_MS ?? "15000"
);

/*─────────────────────────────── Types & Helpers ───────────────────────────────*/

/**
 * Extension de `RequestInit` avec :
 * - `timeoutMs` : timeout de chaque tentative (ms),
 * - `retries`   : tentatives supplémentaires après un abort/timeout (défaut 1).
 *
 * Le signal est géré ici (un par tentative), il n’est pas accepté en entrée.
 */
type JsonInit = Omit<RequestInit, "signal"> & {
  timeoutMs?: number;
  retries?: number;
};

/** Erreur HTTP : statut + corps éventuel. */
export class HttpError extends Error {
  status: number;
  body?: string;
  constructor(status: number, message: string, body?: string) {
    super(`${status} ${message}`);
    this.name = "HttpError";
    this.status = status;
    this.body = body;
  }
}

function withTimeout(ms = DEFAULT_TIMEOUT_MS) {
  const ctrl = new AbortController();
  const id = setTimeout(() => ctrl.abort(), ms);
  return { signal: ctrl.signal, done: () => clearTimeout(id) };
}

/** Chemin relatif → URL via API_BASE ; URL absolue laissée telle quelle. */
export function resolveUrl(pathOrUrl: string) {
  return /^https?:\/\//i.test(pathOrUrl) ? pathOrUrl : joinUrl(API_BASE, pathOrUrl);
}

const isAbort = (e: unknown) =>
  e instanceof Error && (e.name === "AbortError" || /aborted|timeout/i.test(e.message));

type Attempt = { res: Response; text: string };

/**
 * Une tentative = fetch + lecture du corps, sous son propre timeout.
 * Retry uniquement sur abort/timeout (pas sur 4xx/5xx ni erreur réseau).
 */
async function fetchWithRetry(
  input: string,
  init: RequestInit,
  timeoutMs: number,
  retries: number
): Promise<Attempt> {
  const t = withTimeout(timeoutMs);
  try {
    const res = await fetch(input, { ...init, signal: t.signal });
    return { res, text: await res.text() };
  } catch (e) {
    if (retries > 0 && isAbort(e)) {
      console.warn("[http] retry after abort/timeout →", input);
      return fetchWithRetry(input, init, timeoutMs, retries - 1);
    }
    throw e;
  } finally {
    t.done();
  }
}

/*─────────────────────────────── Core JSON fetch ───────────────────────────────*/

/**
 * Fetch JSON typé.
 *
 * - `HttpError(status)` si la réponse n’est pas OK,
 * - `HttpError(500, "Invalid JSON response")` si le corps n’est pas du JSON.
 */
export async function json<T>(path: string, init: JsonInit = {}): Promise<T> {
  const url = resolveUrl(path);
  const { timeoutMs = DEFAULT_TIMEOUT_MS, retries = 1, ...rest } = init;

  const headers = new Headers(rest.headers || {});
  headers.set("accept", "application/json");

  const { res, text } = await fetchWithRetry(
    url,
    { ...rest, headers, cache: "no-store", credentials: "same-origin" },
    timeoutMs,
    retries
  );

  if (!res.ok) throw new HttpError(res.status, res.statusText || "HTTP Error", text);

  try {
    return JSON.parse(text) as T;
  } catch {
    throw new HttpError(500, "Invalid JSON response", text);
  }
}

/*─────────────────────────────── Shortcuts ───────────────────────────────*/

export const getJSON = <T>(
  path: string,
  init: Omit<JsonInit, "method" | "body"> = {}
) => json<T>(path, { ...init, method: "GET" });
