// components/dashboard/InsightsPanel.tsx
//
// Principaux enseignements (onglet "Analyses détaillées"), chiffrés à partir
// de `summarize` sur le jeu complet.

import type { FountainsSummary } from "@/lib/fountains/insights";
import { fmtPct } from "@/components/dashboard/KpiBar";

export default function InsightsPanel({ summary }: { summary: FountainsSummary }) {
  const { total, lines, topLines, controlled, controlledPct, paris, suburbs } = summary;

  return (
    <section className="card insights">
      <h3 className="card__title">📝 Principaux enseignements</h3>
      <ol>
        <li>
          <strong>Couverture du réseau</strong> : {total} fontaines réparties sur {lines} lignes différentes.
        </li>
        <li>
          <strong>Distribution inégale</strong> : les lignes <strong>{topLines.join(", ") || "—"}</strong> sont les
          mieux équipées.
        </li>
        <li>
          <strong>Accessibilité</strong> : seulement{" "}
          <strong>
            {controlled} fontaines ({fmtPct(controlledPct)})
          </strong>{" "}
          sont situées en zone contrôlée (après validation du titre de transport).
        </li>
        <li>
          <strong>Couverture géographique</strong> : {paris} fontaines à Paris et {suburbs} en banlieue.
        </li>
        <li>
          <strong>Recommandations</strong> :
          <ul>
            <li>augmenter le nombre de fontaines sur les lignes les moins équipées ;</li>
            <li>équilibrer la répartition entre Paris et banlieue ;</li>
            <li>installer davantage de fontaines hors zones contrôlées.</li>
          </ul>
        </li>
      </ol>
    </section>
  );
}
