// components/dashboard/KpiBar.tsx
//
// =============================================================================
// Barre de KPIs (cartes horizontales) du dashboard.
//
// Rôle :
// - Afficher une série de KPIs : libellé, valeur principale, sous-texte.
// - Gérer un état "loading" avec skeletons (même nombre de cartes, 4 min.).
//
// Accessibilité :
// - La barre porte un `aria-label` global.
// - Chaque carte est un `role="group"` étiqueté par son `label`.
// =============================================================================

import { useMemo } from "react";

export type KpiItem = {
  label: string;
  value: number | string | null | undefined;
  /** Sous-texte sous la valeur (part du total, précision…). */
  hint?: string;
};

export type KpiBarProps = {
  items: KpiItem[];
  loading?: boolean;
  ariaLabel?: string;
};

/**
 * Formatage de la valeur :
 * - nombres → `toLocaleString("fr-FR")`,
 * - chaînes non vides → telles quelles,
 * - sinon → tiret "—".
 */
function fmtValue(v: KpiItem["value"]) {
  if (typeof v === "number" && Number.isFinite(v)) return v.toLocaleString("fr-FR");
  if (typeof v === "string" && v.trim().length) return v;
  return "—";
}

export default function KpiBar({ items, loading = false, ariaLabel = "Indicateurs clés" }: KpiBarProps) {
  const content = useMemo(() => {
    if (loading) {
      const n = Math.max(4, items.length);
      return Array.from({ length: n }).map((_, i) => (
        <div key={`sk-${i}`} className="kpi-card is-skeleton">
          <div className="kpi__label skeleton-line" />
          <div className="kpi__value skeleton-block" />
        </div>
      ));
    }

    return items.map((it) => (
      <div key={it.label} className="kpi-card" role="group" aria-label={it.label}>
        <div className="kpi__label">{it.label}</div>
        <div className="kpi__value">{fmtValue(it.value)}</div>
        {it.hint && <div className="kpi__hint">{it.hint}</div>}
      </div>
    ));
  }, [items, loading]);

  return (
    <div className="kpi-bar" role="list" aria-label={ariaLabel}>
      {content}
    </div>
  );
}

/* ───────────── Formatteurs ───────────── */

/** `X,Y %` avec `digits` décimales, "—" si non fini. */
export function fmtPct(v: number | string | null | undefined, digits = 1) {
  const num = Number(v);
  if (v === null || v === undefined || !Number.isFinite(num)) return "—";
  return `${num.toLocaleString("fr-FR", { minimumFractionDigits: digits, maximumFractionDigits: digits })} %`;
}
