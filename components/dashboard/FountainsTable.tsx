// components/dashboard/FountainsTable.tsx
//
// Tableau des fontaines filtrées : ligne, station, adresse, commune, zone.
// Défilement vertical dans un conteneur de hauteur fixe, en-tête collant.

import type { FountainDataset } from "@/lib/types";
import { lineColor } from "@/lib/fountains/lineColors";

type Props = {
  rows: FountainDataset
  height?: number
}

export default function FountainsTable({ rows, height = 300 }: Props) {
  if (!rows.length) {
    return <div className="table-empty">Aucune fontaine ne correspond aux filtres.</div>;
  }

  return (
    <div className="table-wrap" style={{ maxHeight: height }}>
      <table className="data-table">
        <thead>
          <tr>
            <th scope="col">Ligne</th>
            <th scope="col">Station</th>
            <th scope="col">Adresse</th>
            <th scope="col">Commune</th>
            <th scope="col">Zone contrôlée</th>
          </tr>
        </thead>
        <tbody>
          {rows.map((r, i) => (
            <tr key={`${r.ratpId}-${i}`}>
              <td>
                <span className="line-badge" style={{ background: lineColor(r.lineId) }}>
                  {r.lineId}
                </span>
              </td>
              <td>{r.station}</td>
              <td>{r.address}</td>
              <td>{r.commune}</td>
              <td>{r.controlledZoneStatus}</td>
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
