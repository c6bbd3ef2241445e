// components/layout/GlobalFooter.tsx
//
// Footer global : nom du tableau de bord, source des données et date de
// préparation du jeu servi par l’API.

import type { ReactNode } from "react";

const dateFmt = new Intl.DateTimeFormat("fr-FR", { day: "2-digit", month: "2-digit", year: "numeric" });

/** "jj/mm/aaaa" ; "—" si la date est absente ou illisible. */
export function fmtDate(iso: string | null | undefined) {
  if (!iso) return "—";
  const d = new Date(iso);
  return Number.isNaN(d.getTime()) ? "—" : dateFmt.format(d);
}

export default function GlobalFooter({
  siteName = "Dashboard des fontaines RATP",
  source = "Open Data RATP",
  updatedAt,
  disclaimer = (
    <>
      Projet indépendant, non affilié à la RATP. Les données proviennent du jeu ouvert « Fontaines à eau dans les
      stations ».
    </>
  ),
}: {
  siteName?: string;
  source?: string;
  /** Date ISO de préparation du jeu (`generated_at`). */
  updatedAt?: string | null;
  disclaimer?: ReactNode;
}) {
  return (
    <footer className="site-footer">
      <div className="footer-grid">
        <div>
          💧 {siteName} | Données : {source} | Dernière mise à jour : {fmtDate(updatedAt)}
        </div>
      </div>
      <div className="footer-disclaimer">{disclaimer}</div>
    </footer>
  );
}
