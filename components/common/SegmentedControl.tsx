// components/common/SegmentedControl.tsx
//
// =============================================================================
// Sélecteur à choix unique (boutons accolés).
//
// Rôle :
// - Choisir une option parmi N (type de transport, zone, onglet…).
// - Accessibilité clavier : flèches gauche/droite (bouclage), Home / End.
// - Agnostique du contexte : le parent fournit `value` et `onChange`.
// =============================================================================

import { useCallback } from "react";
import type { KeyboardEvent } from "react";

export type SegmentOption<T extends string> = { value: T; label: string };

type Props<T extends string> = {
  options: readonly SegmentOption<T>[];
  value: T;
  onChange: (v: T) => void;
  /** Libellé affiché devant le groupe (et lu par les lecteurs d’écran). */
  label?: string;
  /** `tablist` pour des onglets, `radiogroup` sinon. */
  role?: "radiogroup" | "tablist";
  dense?: boolean;
};

export default function SegmentedControl<T extends string>({
  options,
  value,
  onChange,
  label,
  role = "radiogroup",
  dense = false,
}: Props<T>) {
  const itemRole = role === "tablist" ? "tab" : "radio";

  /**
   * Flèches → option voisine (bouclage), Home / End → extrémités.
   */
  const onKeyDown = useCallback(
    (e: KeyboardEvent<HTMLDivElement>) => {
      if (!options.length) return;
      const i = Math.max(0, options.findIndex((o) => o.value === value));
      let next = -1;
      if (e.key === "ArrowRight") next = (i + 1) % options.length;
      else if (e.key === "ArrowLeft") next = (i - 1 + options.length) % options.length;
      else if (e.key === "Home") next = 0;
      else if (e.key === "End") next = options.length - 1;
      if (next < 0) return;
      e.preventDefault();
      onChange(options[next].value);
    },
    [options, value, onChange]
  );

  return (
    <div className={["segmented", dense ? "is-dense" : ""].join(" ")}>
      {label && <span className="segmented__label">{label}</span>}
      <div className="segmented__group" role={role} aria-label={label} onKeyDown={onKeyDown}>
        {options.map((o) => {
          const selected = o.value === value;
          return (
            <button
              key={o.value}
              type="button"
              role={itemRole}
              aria-checked={itemRole === "radio" ? selected : undefined}
              aria-selected={itemRole === "tab" ? selected : undefined}
              tabIndex={selected ? 0 : -1}
              className={selected ? "segmented__item is-active" : "segmented__item"}
              onClick={() => onChange(o.value)}
            >
              {o.label}
            </button>
          );
        })}
      </div>
    </div>
  );
}
