// components/layout/GlobalHeader.tsx
//
// =============================================================================
// Header global : marque + onglets de la page.
//
// - La marque renvoie vers l’accueil.
// - Les onglets sont contrôlés par la page (`tab` / `onTabChange`) ; le
//   header ne fait que les afficher (SegmentedControl en mode `tablist`).
// - Auto-hide au scroll vers le bas, réapparition au scroll vers le haut.
// =============================================================================

import Link from "next/link";
import { useEffect, useRef, useState } from "react";

import SegmentedControl, { type SegmentOption } from "@/components/common/SegmentedControl";

type Props<T extends string> = {
  tabs: readonly SegmentOption<T>[]
  tab: T
  onTabChange: (t: T) => void
  brandHref?: string
}

export default function GlobalHeader<T extends string>({ tabs, tab, onTabChange, brandHref = "/" }: Props<T>) {
  const [hidden, setHidden] = useState(false);
  const lastY = useRef(0);

  useEffect(() => {
    const onScroll = () => {
      const y = window.scrollY;
      // on ne masque qu’au-delà de la hauteur du header
      setHidden(y > lastY.current && y > 80);
      lastY.current = y;
    };
    window.addEventListener("scroll", onScroll, { passive: true });
    return () => window.removeEventListener("scroll", onScroll);
  }, []);

  return (
    <header className={hidden ? "site-header is-hidden" : "site-header"}>
      <div className="container nav">
        <Link href={brandHref} className="brand" aria-label="Accueil">
          <span className="brand-mark" aria-hidden="true">💧</span>
          <span className="brandtext">Fontaines RATP</span>
        </Link>

        <nav className="nav-tabs" aria-label="Navigation principale">
          <SegmentedControl role="tablist" options={tabs} value={tab} onChange={onTabChange} dense />
        </nav>
      </div>
    </header>
  );
}
