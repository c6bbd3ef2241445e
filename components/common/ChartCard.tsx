// components/common/ChartCard.tsx
//
// Carte graphique : titre optionnel + figure Plotly (`{ data, layout }`).
// `react-plotly.js` est chargé côté client uniquement (ssr: false) pour
// éviter les accès à window/document lors du rendu serveur.

import dynamic from "next/dynamic";
import type { ReactNode } from "react";

import type { Figure } from "@/lib/fountains/charts";
import { chartConfig } from "@/lib/plotlyTheme";

const Plot = dynamic(() => import("react-plotly.js").then((m) => m.default), {
  ssr: false,
  loading: () => (
    <div style={{ height: 400, display: "grid", placeItems: "center", opacity: 0.7 }}>
      Chargement du graphique…
    </div>
  ),
});

type Props = {
  figure: Figure
  title?: string
  children?: ReactNode
}

export default function ChartCard({ figure, title, children }: Props) {
  return (
    <section className="card chart-card">
      {title && <h3 className="card__title">{title}</h3>}
      <Plot
        data={figure.data}
        layout={figure.layout}
        config={chartConfig}
        useResizeHandler
        style={{ width: "100%", height: figure.layout.height ?? 400 }}
      />
      {children}
    </section>
  );
}
