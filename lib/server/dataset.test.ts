import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";

import { invalidateFountains, loadFountains, resolveCsvPath } from "./dataset";
import { SchemaError } from "@/lib/fountains/schema";

const HEADER =
  "ID RATP;Ligne;Station;Longitude;Latitude;ID IDFM;Adresse;Code postal;Commune;Numéro d'accès;Nom d'accès;Zone contrôlée;Point géo";

const ROWS = [
  "f-01;7;Gare de l'Est;2.358;48.876;71359;Place du 11 Novembre 1918;75010;Paris;2;Rue d'Alsace;en zone contrôlée;48.876, 2.358",
  "f-02;A;Val de Fontenay;2.487;48.853;70604;Avenue du Maréchal Joffre;94120;Fontenay-sous-Bois;1;;;48.853, 2.487",
];

describe("loadFountains", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "fontaines-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    invalidateFountains();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("charge le jeu livré avec le projet sans anomalie", async () => {
    const shipped = fileURLToPath(new URL("../../data/fontaines.csv", import.meta.url));
    const ds = await loadFountains(shipped);
    expect(ds.records).toHaveLength(24);
    expect(ds.issues).toEqual([]);
    expect(ds.records[0].lineId).toBe("1");
    expect(ds.records[23].lineId).toBe("B");
    expect(ds.records.filter((r) => r.transitType === "RER")).toHaveLength(4);
  });

  it("prépare le fichier et renvoie le même objet tant qu’il n’a pas changé", async () => {
    const file = path.join(dir, "f.csv");
    await fs.writeFile(file, "\uFEFF" + [HEADER, ...ROWS].join("\n"), "utf-8");

    const first = await loadFountains(file);
    expect(first.records.map((r) => r.lineId)).toEqual(["7", "A"]);
    expect(first.records[1].controlledZoneStatus).toBe("non renseigné");
    expect(first.records[1].accessName).toBe("Non spécifié");
    expect(first.source).toBe(file);

    const second = await loadFountains(file);
    expect(second).toBe(first);
  });

  it("recharge après invalidation explicite", async () => {
    const file = path.join(dir, "f.csv");
    await fs.writeFile(file, [HEADER, ...ROWS].join("\n"), "utf-8");

    const first = await loadFountains(file);
    invalidateFountains();
    const second = await loadFountains(file);

    expect(second).not.toBe(first);
    expect(second.records).toEqual(first.records);
  });

  it("recharge quand le fichier change", async () => {
    const file = path.join(dir, "f.csv");
    await fs.writeFile(file, [HEADER, ROWS[0]].join("\n"), "utf-8");
    const first = await loadFountains(file);
    expect(first.records).toHaveLength(1);

    await fs.writeFile(file, [HEADER, ...ROWS].join("\n"), "utf-8");
    const second = await loadFountains(file);
    expect(second.records).toHaveLength(2);
  });

  it("propage SchemaError et ne met rien en cache", async () => {
    const file = path.join(dir, "bad.csv");
    await fs.writeFile(file, [HEADER, "f-01;7;Gare de l'Est"].join("\n"), "utf-8");

    await expect(loadFountains(file)).rejects.toBeInstanceOf(SchemaError);

    await fs.writeFile(file, [HEADER, ...ROWS].join("\n"), "utf-8");
    const ok = await loadFountains(file);
    expect(ok.records).toHaveLength(2);
  });
});

describe("resolveCsvPath", () => {
  it("résout un chemin relatif depuis le répertoire courant", () => {
    expect(resolveCsvPath("data/x.csv")).toBe(path.resolve(process.cwd(), "data/x.csv"));
  });

  it("garde un chemin absolu tel quel", () => {
    expect(resolveCsvPath("/tmp/x.csv")).toBe("/tmp/x.csv");
  });
});
