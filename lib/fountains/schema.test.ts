import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FOUNTAIN_COLUMNS, SchemaError, parseFountainsCsv } from "./schema";

const HEADER = FOUNTAIN_COLUMNS.join(";");
const ROW = "f-01;4;Château Rouge;2.349;48.887;71420;Boulevard Barbès;75018;Paris;1;Rue Poulet;en zone contrôlée;48.887, 2.349";

describe("parseFountainsCsv", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("retire l’en-tête et renvoie les lignes positionnelles", () => {
    const rows = parseFountainsCsv(`${HEADER}\n${ROW}\n`);
    expect(rows).toHaveLength(1);
    expect(rows[0]).toHaveLength(13);
    expect(rows[0][1]).toBe("4");
    expect(rows[0][12]).toBe("48.887, 2.349");
  });

  it("tolère le BOM UTF-8 et les lignes vides", () => {
    const rows = parseFountainsCsv(`\uFEFF${HEADER}\r\n\r\n${ROW}\r\n`);
    expect(rows).toHaveLength(1);
    expect(rows[0][0]).toBe("f-01");
  });

  it("garde un champ entre guillemets contenant le séparateur", () => {
    const row = ROW.replace("Rue Poulet", '"Rue Poulet; sortie 2"');
    const rows = parseFountainsCsv(`${HEADER}\n${row}`);
    expect(rows[0][10]).toBe("Rue Poulet; sortie 2");
  });

  it("renvoie un tableau vide pour un fichier réduit à l’en-tête", () => {
    expect(parseFountainsCsv(HEADER)).toEqual([]);
  });

  it("rejette un en-tête de mauvaise largeur", () => {
    const err = captureSchemaError(() => parseFountainsCsv("a;b;c\n" + ROW));
    expect(err.row).toBe(0);
    expect(err.actual).toBe(3);
    expect(err.expected).toBe(13);
  });

  it("rejette une ligne de données de mauvaise largeur", () => {
    const err = captureSchemaError(() => parseFountainsCsv(`${HEADER}\n${ROW}\n${ROW};extra`));
    expect(err.row).toBe(2);
    expect(err.actual).toBe(14);
    expect(err.message).toBe("ligne 2 : 14 colonnes au lieu de 13");
  });

  it("rejette un fichier vide", () => {
    const err = captureSchemaError(() => parseFountainsCsv(""));
    expect(err.row).toBe(0);
    expect(err.actual).toBe(0);
  });
});

function captureSchemaError(fn: () => unknown): SchemaError {
  try {
    fn();
  } catch (e) {
    if (e instanceof SchemaError) return e;
    throw e;
  }
  throw new Error("SchemaError attendue");
}
