import { describe, expect, it } from "vitest";

import { rerNote, summarize, uniqueLineOptions } from "./insights";
import { prepare } from "./prepare";
import { MIXED_ROWS } from "./__fixtures__/rows";

const data = prepare(MIXED_ROWS);

describe("summarize", () => {
  it("calcule les KPIs et enseignements", () => {
    expect(summarize(data)).toEqual({
      total: 8,
      lines: 5,
      communes: 3,
      controlled: 5,
      controlledPct: 62.5,
      paris: 6,
      suburbs: 2,
      topLines: ["1", "2", "A", "3bis"],
      rerLines: ["A"],
      rerCount: 2,
    });
  });

  it("tolère un jeu vide", () => {
    expect(summarize([])).toEqual({
      total: 0,
      lines: 0,
      communes: 0,
      controlled: 0,
      controlledPct: null,
      paris: 0,
      suburbs: 0,
      topLines: [],
      rerLines: [],
      rerCount: 0,
    });
  });
});

describe("uniqueLineOptions", () => {
  it("liste les lignes distinctes en ordre lexical", () => {
    expect(uniqueLineOptions(data)).toEqual(["1", "10", "2", "3bis", "A"]);
  });
});

describe("rerNote", () => {
  it("signale une seule ligne RER et les lignes absentes", () => {
    expect(rerNote({ rerLines: ["A"], rerCount: 6 })).toBe(
      "Dans ce jeu de données, seule la ligne RER A est représentée (6 fontaines). " +
        "Les autres lignes RER (B, C, D, E) ne figurent pas dans les données disponibles."
    );
  });

  it("accorde au pluriel", () => {
    expect(rerNote({ rerLines: ["A", "B"], rerCount: 1 })).toBe(
      "Dans ce jeu de données, seules les lignes RER A, RER B sont représentées (1 fontaine). " +
        "Les autres lignes RER (C, D, E) ne figurent pas dans les données disponibles."
    );
  });

  it("omet la liste des absentes quand toutes sont présentes", () => {
    expect(rerNote({ rerLines: ["A", "B", "C", "D", "E"], rerCount: 5 })).toBe(
      "Dans ce jeu de données, seules les lignes RER A, RER B, RER C, RER D, RER E sont représentées (5 fontaines)."
    );
  });

  it("gère l’absence de RER", () => {
    expect(rerNote({ rerLines: [], rerCount: 0 })).toBe("Aucune ligne RER n’est représentée dans ce jeu de données.");
  });
});
