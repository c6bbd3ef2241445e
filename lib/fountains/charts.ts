// lib/fountains/charts.ts
//
// =============================================================================
// Figures Plotly du dashboard (données + layout), construites à partir d’un
// jeu (filtré ou complet). Fonctions pures : le rendu (`react-plotly.js`)
// reste dans les pages.
//
// Les identifiants de ligne sont forcés en axe catégoriel : sans cela Plotly
// détecte "1", "10"… comme des nombres et passe en axe linéaire.
// =============================================================================

import type * as Plotly from "plotly.js";
import type { FountainDataset } from "@/lib/types";
import { chartLayout } from "@/lib/plotlyTheme";
import { countByCategory, countByLine, topLines } from "@/lib/fountains/filter";

export type Figure = {
  data: Plotly.Data[]
  layout: Partial<Plotly.Layout>
}

const TYPE_COLORS = ["#1f77b4", "#ff7f0e"];

/** Barres : nombre de fontaines par ligne, dans l’ordre d’affichage. */
export function lineDistributionFigure(dataset: FountainDataset): Figure {
  const counts = countByLine(dataset);
  const x = Array.from(counts.keys());
  const y = Array.from(counts.values());

  return {
    data: [
      {
        type: "bar",
        x,
        y,
        marker: { color: y, colorscale: "Blues" },
        hovertemplate: "Ligne %{x} — %{y} fontaine(s)<extra></extra>",
      },
    ],
    layout: chartLayout({
      title: { text: "Distribution des fontaines par ligne de métro/RER" },
      showlegend: false,
      xaxis: { title: { text: "Ligne" }, type: "category", categoryorder: "array", categoryarray: x },
      yaxis: { title: { text: "Nombre de fontaines" }, rangemode: "tozero" },
    }),
  };
}

/** Camembert : répartition par statut de zone contrôlée. */
export function zoneBreakdownFigure(dataset: FountainDataset): Figure {
  const counts = countByCategory(dataset, "controlledZoneStatus");
  return {
    data: [
      {
        type: "pie",
        labels: Array.from(counts.keys()),
        values: Array.from(counts.values()),
        textinfo: "label+percent",
        textposition: "inside",
      },
    ],
    layout: chartLayout({ title: { text: "Répartition des fontaines par type de zone" } }),
  };
}

/** Barres : Métro vs RER. */
export function transitTypeFigure(dataset: FountainDataset): Figure {
  const counts = countByCategory(dataset, "transitType");
  const x = Array.from(counts.keys());
  const y = Array.from(counts.values());
  return {
    data: [
      {
        type: "bar",
        x,
        y,
        text: y.map(String),
        textposition: "auto",
        marker: { color: TYPE_COLORS.slice(0, x.length) },
      },
    ],
    layout: chartLayout({
      title: { text: "Comparaison Métro vs RER" },
      showlegend: false,
      xaxis: { title: { text: "Type de transport" }, type: "category" },
      yaxis: { title: { text: "Nombre de fontaines" }, rangemode: "tozero" },
    }),
  };
}

/** Camembert : Paris vs Banlieue. */
export function regionFigure(dataset: FountainDataset): Figure {
  const counts = countByCategory(dataset, "region");
  return {
    data: [
      {
        type: "pie",
        labels: Array.from(counts.keys()),
        values: Array.from(counts.values()),
      },
    ],
    layout: chartLayout({ title: { text: "Distribution géographique" } }),
  };
}

/** Barres horizontales : N lignes les mieux équipées (axe X étendu de 15 %). */
export function topLinesFigure(dataset: FountainDataset, n = 10): Figure {
  const top = topLines(dataset, n);
  const x = top.map(([, count]) => count);
  const max = x.length ? Math.max(...x) : 0;

  return {
    data: [
      {
        type: "bar",
        orientation: "h",
        x,
        y: top.map(([line]) => line),
        text: x.map(String),
        textposition: "outside",
        marker: { color: "lightblue" },
      },
    ],
    layout: chartLayout({
      showlegend: false,
      xaxis: { title: { text: "Nombre de fontaines" }, range: [0, Math.max(1, max) * 1.15] },
      yaxis: { title: { text: "Ligne" }, type: "category", categoryorder: "total ascending" },
    }),
  };
}
