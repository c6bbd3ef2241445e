// lib/plotlyTheme.ts
//
// =============================================================================
// Thème Plotly commun aux graphiques du dashboard fontaines.
//
// Rôle :
// - `chartConfig` : options d’interaction (pas de barre d’outils, responsive).
// - `chartLayout(overrides)` : layout de base (marges, police, axes) que
//   chaque figure surcharge.
//
// Aucune logique métier ici. `chartLayout` reste pur et sérialisable.
// =============================================================================

import type * as Plotly from "plotly.js";

/* ──────────────────────────── CONFIG ──────────────────────────── */
export const chartConfig: Partial<Plotly.Config> = {
  displayModeBar: false,
  responsive: true,
  scrollZoom: false,
};

/* ──────────────────────────── LAYOUT ──────────────────────────── */
/**
 * Layout de base, surchargeable :
 *
 *   const layout = chartLayout({ height: 400, showlegend: false });
 *
 * La surcharge est superficielle : passer `xaxis` remplace tout l’axe X.
 */
export function chartLayout(
  overrides: Partial<Plotly.Layout> = {}
): Partial<Plotly.Layout> {
  const base: Partial<Plotly.Layout> = {
    autosize: true,
    height: 400,

    // marges larges pour ne pas rogner les libellés de lignes
    margin: { l: 52, r: 12, t: 48, b: 48 },

    paper_bgcolor: "rgba(0,0,0,0)",
    plot_bgcolor: "rgba(0,0,0,0)",

    font: {
      family: "Inter, system-ui, -apple-system, Segoe UI, Roboto, sans-serif",
      size: 12,
      color: "#1f2933",
    },

    legend: {
      orientation: "h",
      yanchor: "bottom",
      y: 1.02,
      xanchor: "left",
      x: 0,
      font: { size: 11 },
    },

    xaxis: {
      gridcolor: "rgba(0,0,0,.06)",
      zeroline: false,
      automargin: true,
      ticks: "outside",
      ticklen: 6,
    },

    yaxis: {
      gridcolor: "rgba(0,0,0,.06)",
      zeroline: false,
      rangemode: "tozero",
      automargin: true,
      ticks: "outside",
      ticklen: 6,
    },
  };

  return { ...base, ...overrides };
}
