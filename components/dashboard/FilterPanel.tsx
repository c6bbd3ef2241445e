// components/dashboard/FilterPanel.tsx
//
// =============================================================================
// Filtres interactifs du dashboard.
//
// - Lignes : puces cochables (multi-sélection) + raccourcis "Toutes" / "Aucune".
// - Type de transport : Tous / Métro / RER.
// - Zone contrôlée : Toutes / en zone contrôlée / non renseigné.
//
// Le composant est contrôlé : la sélection vit dans la page, qui recalcule
// la vue filtrée à chaque `onChange`.
// =============================================================================

import { useCallback } from "react";

import SegmentedControl, { type SegmentOption } from "@/components/common/SegmentedControl";
import { lineColor } from "@/lib/fountains/lineColors";
import {
  ALL,
  ZONE_CONTROLLED,
  ZONE_UNSPECIFIED,
  type TransitTypeChoice,
  type ZoneStatusChoice,
} from "@/lib/types";

export type FilterState = {
  /** Absent → toutes les lignes (aucun choix fait). */
  lines?: string[]
  transitType: TransitTypeChoice
  zoneStatus: ZoneStatusChoice
}

const TYPE_OPTIONS: SegmentOption<TransitTypeChoice>[] = [
  { value: ALL, label: "Tous" },
  { value: "Métro", label: "Métro" },
  { value: "RER", label: "RER" },
];

const ZONE_OPTIONS: SegmentOption<ZoneStatusChoice>[] = [
  { value: ALL, label: "Toutes" },
  { value: ZONE_CONTROLLED, label: ZONE_CONTROLLED },
  { value: ZONE_UNSPECIFIED, label: ZONE_UNSPECIFIED },
];

type Props = {
  /** Options de lignes, dans l’ordre où les afficher. */
  lineOptions: string[]
  value: FilterState
  onChange: (next: FilterState) => void
}

export default function FilterPanel({ lineOptions, value, onChange }: Props) {
  const selected = value.lines ?? lineOptions;

  const toggleLine = useCallback(
    (id: string) => {
      const has = selected.includes(id);
      const lines = has ? selected.filter((l) => l !== id) : [...selected, id];
      onChange({ ...value, lines });
    },
    [selected, value, onChange]
  );

  return (
    <section className="filters" aria-label="Filtres interactifs">
      <div className="filters__lines">
        <div className="filters__head">
          <span className="filters__label">Lignes ({selected.length}/{lineOptions.length})</span>
          <button type="button" className="btn-link" onClick={() => onChange({ ...value, lines: undefined })}>
            Toutes
          </button>
          <button type="button" className="btn-link" onClick={() => onChange({ ...value, lines: [] })}>
            Aucune
          </button>
        </div>

        <div className="chips" role="group" aria-label="Sélectionner les lignes">
          {lineOptions.map((id) => {
            const on = selected.includes(id);
            return (
              <button
                key={id}
                type="button"
                aria-pressed={on}
                className={on ? "chip is-on" : "chip"}
                style={{ borderColor: lineColor(id) }}
                onClick={() => toggleLine(id)}
              >
                <span className="chip__dot" style={{ background: lineColor(id) }} aria-hidden="true" />
                {id}
              </button>
            );
          })}
        </div>
      </div>

      <SegmentedControl
        label="Type de transport"
        options={TYPE_OPTIONS}
        value={value.transitType}
        onChange={(transitType) => onChange({ ...value, transitType })}
      />

      <SegmentedControl
        label="Zone contrôlée"
        options={ZONE_OPTIONS}
        value={value.zoneStatus}
        onChange={(zoneStatus) => onChange({ ...value, zoneStatus })}
      />
    </section>
  );
}
