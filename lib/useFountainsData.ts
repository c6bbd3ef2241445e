// lib/useFountainsData.ts
//
// =============================================================================
// Hook de données du dashboard fontaines.
//
// Rôle :
// - Charger une fois le jeu préparé (`getFountains`) et l’exposer en lecture
//   seule aux composants.
// - Relancer le chargement à la demande (`refresh`) et au retour en ligne.
// - Exposer un contrat simple : { records, generatedAt, issues, loading,
//   error, refresh }.
//
// Le filtrage n’est PAS fait ici : la page le recalcule à chaque changement
// de sélection (useMemo), le jeu de base reste inchangé.
// =============================================================================

import { useCallback, useEffect, useRef, useState } from "react";

import { getFountains } from "@/lib/services/fountains";
import type { FountainDataset, ParseIssue } from "@/lib/types";

const EMPTY: FountainDataset = Object.freeze([]);

export function useFountainsData() {
  const [records, setRecords] = useState<FountainDataset>(EMPTY);
  const [generatedAt, setGeneratedAt] = useState<string | null>(null);
  const [issues, setIssues] = useState<ParseIssue[]>([]);
  const [loading, setLoading] = useState<boolean>(false);
  const [error, setError] = useState<string | null>(null);

  // Flag de vie pour éviter les `setState` après unmount
  const alive = useRef(true);

  const load = useCallback(async () => {
    if (!alive.current) return;
    setLoading(true);
    setError(null);

    try {
      const payload = await getFountains();
      if (!alive.current) return;
      setRecords(payload.records);
      setGeneratedAt(payload.generatedAt);
      setIssues(payload.issues);
    } catch (e) {
      console.error("[useFountainsData] load failed:", e);
      if (alive.current) setError(e instanceof Error ? e.message : String(e));
    } finally {
      if (alive.current) setLoading(false);
    }
  }, []);

  useEffect(() => {
    alive.current = true;
    void load();

    const onOnline = () => {
      if (navigator.onLine) void load();
    };
    window.addEventListener("online", onOnline);

    return () => {
      alive.current = false;
      window.removeEventListener("online", onOnline);
    };
  }, [load]);

  return {
    records,
    generatedAt,
    issues,
    loading,
    error,
    refresh: load,
  };
}
