// pages/index.tsx
//
// =============================================================================
// Dashboard des fontaines à eau RATP (page unique, deux onglets).
//
// Onglet "Dashboard" :
//   - KPIs du jeu complet (total, lignes, communes, zone contrôlée) ;
//   - filtres (lignes, type, zone) → vue filtrée recalculée via useMemo ;
//   - distribution par ligne, répartition des zones, carte, tableau.
//
// Onglet "Analyses détaillées" (jeu complet) :
//   - Métro vs RER + note sur les lignes RER présentes ;
//   - Paris vs Banlieue ; top 10 des lignes ; enseignements chiffrés.
// =============================================================================

import dynamic from "next/dynamic";
import { useEffect, useMemo, useState } from "react";

import GlobalHeader from "@/components/layout/GlobalHeader";
import GlobalFooter from "@/components/layout/GlobalFooter";
import LoadingBar, { type LoadingBarStatus } from "@/components/common/LoadingBar";
import ChartCard from "@/components/common/ChartCard";
import type { SegmentOption } from "@/components/common/SegmentedControl";
import KpiBar, { fmtPct, type KpiItem } from "@/components/dashboard/KpiBar";
import FilterPanel, { type FilterState } from "@/components/dashboard/FilterPanel";
import FountainsTable from "@/components/dashboard/FountainsTable";
import InsightsPanel from "@/components/dashboard/InsightsPanel";

import { useFountainsData } from "@/lib/useFountainsData";
import { filterFountains, openSelection } from "@/lib/fountains/filter";
import { rerNote, summarize, uniqueLineOptions } from "@/lib/fountains/insights";
import {
  lineDistributionFigure,
  regionFigure,
  topLinesFigure,
  transitTypeFigure,
  zoneBreakdownFigure,
} from "@/lib/fountains/charts";

/* Carte Leaflet (client only) */
const FountainsMap = dynamic(() => import("@/components/dashboard/FountainsMap"), {
  ssr: false,
  loading: () => <div className="map-card is-loading">Chargement de la carte…</div>,
});

type Tab = "dashboard" | "analyses";

const TABS: SegmentOption<Tab>[] = [
  { value: "dashboard", label: "📊 Dashboard" },
  { value: "analyses", label: "📈 Analyses détaillées" },
];

export default function DashboardPage() {
  const { records, generatedAt, issues, loading, error, refresh } = useFountainsData();
  const [tab, setTab] = useState<Tab>("dashboard");

  // ─────────────────────────────
  // Filtres : sélection ouverte (toutes les lignes) au départ et à chaque
  // rechargement du jeu, sans passer par une liste vide
  // ─────────────────────────────
  const lineOptions = useMemo(() => uniqueLineOptions(records), [records]);
  const [filters, setFilters] = useState<FilterState>(openSelection);

  useEffect(() => {
    setFilters(openSelection());
  }, [lineOptions]);

  const filtered = useMemo(() => filterFountains(records, filters), [records, filters]);

  // ─────────────────────────────
  // Indicateurs & figures
  // ─────────────────────────────
  const summary = useMemo(() => summarize(records), [records]);

  const kpis = useMemo<KpiItem[]>(
    () => [
      { label: "Total fontaines", value: summary.total },
      { label: "Lignes équipées", value: summary.lines },
      { label: "Communes desservies", value: summary.communes },
      { label: "En zone contrôlée", value: summary.controlled, hint: fmtPct(summary.controlledPct) },
    ],
    [summary]
  );

  const lineFig = useMemo(() => lineDistributionFigure(filtered), [filtered]);
  const zoneFig = useMemo(() => zoneBreakdownFigure(filtered), [filtered]);
  const typeFig = useMemo(() => transitTypeFigure(records), [records]);
  const regionFig = useMemo(() => regionFigure(records), [records]);
  const topFig = useMemo(() => topLinesFigure(records, 10), [records]);

  const barStatus: LoadingBarStatus = loading ? "loading" : error ? "error" : "success";

  return (
    <>
      <GlobalHeader tabs={TABS} tab={tab} onTabChange={setTab} />
      <LoadingBar status={barStatus} errorLabel={error} onRetry={() => void refresh()} />

      <main className="container page">
        {tab === "dashboard" ? (
          <>
            <section className="intro">
              <h1>💧 Dashboard d’analyse des fontaines à eau RATP</h1>
              <p>
                Ce dashboard présente l’analyse des <strong>{summary.total} fontaines à eau</strong> installées dans le
                réseau RATP (métro et RER). Explorez la distribution, la localisation et les caractéristiques de ces
                équipements.
              </p>
              {issues.length > 0 && (
                <p className="muted">
                  Valeurs numériques illisibles dans le fichier source : {issues.length} (laissées vides).
                </p>
              )}
            </section>

            <KpiBar items={kpis} loading={loading && !records.length} />

            <h2>🔍 Filtres interactifs</h2>
            <FilterPanel lineOptions={lineOptions} value={filters} onChange={setFilters} />

            <div className="info-banner" role="status">
              <strong>{filtered.length} fontaines</strong> correspondent à vos critères de filtrage
            </div>

            <div className="grid-2">
              <ChartCard figure={lineFig} />
              <ChartCard figure={zoneFig} />
            </div>

            <h2>🗺️ Carte interactive des fontaines</h2>
            <FountainsMap rows={filtered} />

            <h2>📋 Données filtrées</h2>
            <FountainsTable rows={filtered} />
          </>
        ) : (
          <>
            <h1>📈 Analyses détaillées</h1>

            <div className="grid-2">
              <ChartCard figure={typeFig}>
                <div className="info-banner">ℹ️ {rerNote(summary)}</div>
              </ChartCard>
              <ChartCard figure={regionFig} title="Répartition Paris vs Banlieue" />
            </div>

            <ChartCard figure={topFig} title="🏆 Top 10 des lignes les mieux équipées" />

            <InsightsPanel summary={summary} />
          </>
        )}
      </main>

      <GlobalFooter updatedAt={generatedAt} />
    </>
  );
}
