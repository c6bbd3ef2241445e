import { describe, expect, it } from "vitest";

import {
  lineDistributionFigure,
  regionFigure,
  topLinesFigure,
  transitTypeFigure,
  zoneBreakdownFigure,
} from "./charts";
import { prepare } from "./prepare";
import { MIXED_ROWS } from "./__fixtures__/rows";
import { lineColor } from "./lineColors";

const data = prepare(MIXED_ROWS);

describe("figures", () => {
  it("distribution par ligne : axe catégoriel dans l’ordre d’affichage", () => {
    const fig = lineDistributionFigure(data);
    expect(fig.data).toHaveLength(1);
    expect(fig.data[0]).toMatchObject({
      type: "bar",
      x: ["1", "2", "3bis", "10", "A"],
      y: [2, 2, 1, 1, 2],
    });
    expect(fig.layout.xaxis).toMatchObject({
      type: "category",
      categoryorder: "array",
      categoryarray: ["1", "2", "3bis", "10", "A"],
    });
  });

  it("zones : camembert trié par effectif", () => {
    expect(zoneBreakdownFigure(data).data[0]).toMatchObject({
      type: "pie",
      labels: ["en zone contrôlée", "non renseigné"],
      values: [5, 3],
    });
  });

  it("Métro vs RER : une couleur par barre", () => {
    expect(transitTypeFigure(data).data[0]).toMatchObject({
      x: ["Métro", "RER"],
      y: [6, 2],
      text: ["6", "2"],
      marker: { color: ["#1f77b4", "#ff7f0e"] },
    });
  });

  it("Paris vs Banlieue", () => {
    expect(regionFigure(data).data[0]).toMatchObject({
      labels: ["Paris", "Banlieue"],
      values: [6, 2],
    });
  });

  it("top lignes : barres horizontales, axe étendu de 15 %", () => {
    const fig = topLinesFigure(data, 3);
    expect(fig.data[0]).toMatchObject({
      orientation: "h",
      x: [2, 2, 2],
      y: ["1", "2", "A"],
    });
    const range = fig.layout.xaxis?.range ?? [];
    expect(range[0]).toBe(0);
    expect(range[1]).toBeCloseTo(2.3);
  });

  it("top lignes sur un jeu vide", () => {
    const fig = topLinesFigure([]);
    expect(fig.data[0]).toMatchObject({ x: [], y: [] });
    expect(fig.layout.xaxis?.range?.[1]).toBeCloseTo(1.15);
  });
});

describe("lineColor", () => {
  it("renvoie la couleur officielle ou un gris", () => {
    expect(lineColor("1")).toBe("#FFCD00");
    expect(lineColor("A")).toBe("#E3051C");
    expect(lineColor("99")).toBe("#9aa0a6");
  });
});
