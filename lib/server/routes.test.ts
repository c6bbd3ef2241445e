import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { promises as fs } from "fs";
import os from "os";
import path from "path";

import { fountainsRoute, revalidateRoute } from "./routes";
import { invalidateFountains } from "./dataset";
import { FOUNTAIN_COLUMNS } from "@/lib/fountains/schema";

const HEADER = FOUNTAIN_COLUMNS.join(";");
const ROWS = [
  "f-02;14;Bercy;2.379;48.840;71576;Boulevard de Bercy;75012;Paris;3;Rue de Bercy;en zone contrôlée;48.840, 2.379",
  "f-01;1;Bastille;2.369;48.853;71541;Place de la Bastille;75011;Paris;1;;;48.853, 2.369",
  "f-03;7;Villejuif;2.364;48.796;70803;Avenue de Paris;9x800;Villejuif;2;Hôpital;;48.796, 2.364",
];

describe("routes API", () => {
  let dir: string;
  let csv: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "fontaines-api-"));
    csv = path.join(dir, "fontaines.csv");
    await fs.writeFile(csv, [HEADER, ...ROWS].join("\n"), "utf-8");
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    invalidateFountains();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe("fountainsRoute", () => {
    it("renvoie le jeu préparé trié", async () => {
      const { status, body } = await fountainsRoute("GET", csv);
      expect(status).toBe(200);
      expect(body).toMatchObject({
        source: "fontaines.csv",
        count: 3,
        issues: [{ row: 3, field: "postalCode", raw: "9x800" }],
      });
      if (!("rows" in body)) throw new Error("rows attendues");
      expect(body.rows.map((r) => r.lineId)).toEqual(["1", "14", "7"]);
      expect(body.rows[0].controlledZoneStatus).toBe("non renseigné");
      expect(body.rows[2].region).toBe("Banlieue");
    });

    it("refuse les autres méthodes", async () => {
      const out = await fountainsRoute("POST", csv);
      expect(out).toEqual({
        status: 405,
        body: { ok: false, error: "Method not allowed" },
        headers: { Allow: "GET" },
      });
    });

    it("traduit une SchemaError en 500 explicite", async () => {
      await fs.writeFile(csv, "a;b\n1;2", "utf-8");
      const out = await fountainsRoute("GET", csv);
      expect(out.status).toBe(500);
      expect(out.body).toEqual({ ok: false, error: "CSV invalide — en-tête : 2 colonnes au lieu de 13" });
    });

    it("renvoie un 500 générique si le fichier manque", async () => {
      const out = await fountainsRoute("GET", path.join(dir, "absent.csv"));
      expect(out).toEqual({ status: 500, body: { ok: false, error: "Jeu de données indisponible" } });
    });
  });

  describe("revalidateRoute", () => {
    it("refuse sans secret configuré", async () => {
      vi.stubEnv("REVALIDATE_SECRET", "");
      const out = await revalidateRoute("POST", "", csv);
      expect(out.status).toBe(401);
    });

    it("refuse un mauvais secret", async () => {
      vi.stubEnv("REVALIDATE_SECRET", "test-secret");
      const out = await revalidateRoute("POST", "autre", csv);
      expect(out).toEqual({ status: 401, body: { ok: false, error: "Unauthorized" } });
    });

    it("refuse GET", async () => {
      vi.stubEnv("REVALIDATE_SECRET", "test-secret");
      const out = await revalidateRoute("GET", "test-secret", csv);
      expect(out.status).toBe(405);
      expect(out.headers).toEqual({ Allow: "POST" });
    });

    it("recharge le fichier avec le bon secret", async () => {
      vi.stubEnv("REVALIDATE_SECRET", "test-secret");
      await fountainsRoute("GET", csv);

      await fs.writeFile(csv, [HEADER, ROWS[0]].join("\n"), "utf-8");
      const out = await revalidateRoute("POST", "test-secret", csv);

      expect(out.status).toBe(200);
      expect(out.body).toMatchObject({ ok: true, count: 1, issues: 0 });
    });
  });
});
