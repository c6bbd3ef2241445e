/**
 * Tests de lib/http : fetch est remplacé par un mock (vi.stubGlobal),
 * aucun appel réseau réel.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { HttpError, getJSON, json, resolveUrl } from "./http";

const abortError = () => Object.assign(new Error("This operation was aborted"), { name: "AbortError" });

/** Réponse qui n’arrive jamais : rejette seulement quand le signal est abandonné. */
function hang(init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) return;
    if (signal.aborted) reject(abortError());
    signal.addEventListener("abort", () => reject(abortError()));
  });
}

/** Réponse immédiate, sauf si le signal reçu est déjà abandonné. */
function answer(body: unknown, init?: RequestInit): Promise<Response> {
  if (init?.signal?.aborted) return Promise.reject(abortError());
  return Promise.resolve(new Response(JSON.stringify(body), { status: 200 }));
}

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllGlobals();
});

describe("json", () => {
  it("relance après un timeout avec un signal neuf", async () => {
    const fetchMock = vi
      .fn((_url: string, init?: RequestInit) => answer({ ok: 1 }, init))
      .mockImplementationOnce((_url: string, init?: RequestInit) => hang(init));
    vi.stubGlobal("fetch", fetchMock);

    await expect(json("/x", { timeoutMs: 20 })).resolves.toEqual({ ok: 1 });

    expect(fetchMock).toHaveBeenCalledTimes(2);
    const [first, second] = fetchMock.mock.calls.map(([, init]) => init?.signal);
    expect(first?.aborted).toBe(true);
    expect(second?.aborted).toBe(false);
  });

  it("abandonne après les tentatives autorisées", async () => {
    const fetchMock = vi.fn((_url: string, init?: RequestInit) => hang(init));
    vi.stubGlobal("fetch", fetchMock);

    await expect(json("/x", { timeoutMs: 10, retries: 1 })).rejects.toMatchObject({ name: "AbortError" });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("ne relance pas sur un statut d’erreur", async () => {
    const fetchMock = vi.fn(() => Promise.resolve(new Response("boom", { status: 503, statusText: "Unavailable" })));
    vi.stubGlobal("fetch", fetchMock);

    const err = await json("/x").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HttpError);
    expect(err).toMatchObject({ status: 503, body: "boom", message: "503 Unavailable" });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("ne relance pas sur une erreur réseau", async () => {
    const fetchMock = vi.fn(() => Promise.reject(new TypeError("fetch failed")));
    vi.stubGlobal("fetch", fetchMock);

    await expect(json("/x")).rejects.toThrow("fetch failed");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("signale un corps non JSON", async () => {
    vi.stubGlobal("fetch", vi.fn(() => Promise.resolve(new Response("<html>", { status: 200 }))));
    await expect(json("/x")).rejects.toMatchObject({ status: 500, body: "<html>" });
  });
});

describe("getJSON", () => {
  it("envoie un GET sans cache vers l’URL résolue", async () => {
    const fetchMock = vi.fn((_url: string, init?: RequestInit) => answer([1, 2], init));
    vi.stubGlobal("fetch", fetchMock);

    await expect(getJSON<number[]>("/fountains")).resolves.toEqual([1, 2]);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("/api/fountains");
    expect(init?.method).toBe("GET");
    expect(init?.cache).toBe("no-store");
    expect(new Headers(init?.headers).get("accept")).toBe("application/json");
  });
});

describe("resolveUrl", () => {
  it("préfixe les chemins relatifs par la base API", () => {
    expect(resolveUrl("fountains")).toBe("/api/fountains");
  });

  it("laisse les URLs absolues intactes", () => {
    expect(resolveUrl("https://example.test/x")).toBe("https://example.test/x");
  });
});
