// components/common/LoadingBar.tsx
//
// =============================================================================
// Barre d’état du chargement du jeu de données.
//
// - "loading" : barre animée ;
// - "success" : flash bref puis disparition ;
// - "error"   : message (hors ligne / API) + bouton "Réessayer" si `onRetry` ;
// - "idle"    : rien.
//
// `role="status"` + `aria-live` : les lecteurs d’écran annoncent les changements.
// =============================================================================

import { useEffect, useState } from "react";

export type LoadingBarStatus = "idle" | "loading" | "success" | "error";

type Props = {
  status: LoadingBarStatus;
  /** Durée du flash "success" (ms). */
  successFlashMs?: number;
  onRetry?: () => void;
  /** Message d’erreur ; à défaut, message selon l’état réseau. */
  errorLabel?: string | null;
};

export default function LoadingBar({ status, successFlashMs = 500, onRetry, errorLabel }: Props) {
  const [show, setShow] = useState(false);

  useEffect(() => {
    if (status === "idle") {
      setShow(false);
      return;
    }
    setShow(true);
    if (status !== "success") return;

    const t = setTimeout(() => setShow(false), successFlashMs);
    return () => clearTimeout(t);
  }, [status, successFlashMs]);

  if (!show) return null;

  const offline = typeof navigator !== "undefined" && navigator.onLine === false;
  const errText =
    errorLabel || (offline ? "Hors ligne — vérifiez votre connexion." : "Erreur de chargement — réessayez.");

  return (
    <div
      className={`loadingbar is-${status}`}
      role="status"
      aria-live={status === "error" ? "assertive" : "polite"}
      aria-label={
        status === "loading" ? "Chargement en cours" : status === "success" ? "Chargement réussi" : "Erreur de chargement"
      }
    >
      <div className="loadingbar__track">
        <div className="loadingbar__bar" />
      </div>

      {status === "error" && (
        <div className="loadingbar__msg">
          <span>{errText}</span>
          {onRetry && (
            <button type="button" className="loadingbar__retry" onClick={onRetry}>
              Réessayer
            </button>
          )}
        </div>
      )}
    </div>
  );
}
