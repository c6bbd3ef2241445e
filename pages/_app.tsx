// pages/_app.tsx
//
// -----------------------------------------------------------------------------
// Custom App (Next.js) : point d'entrée UI
//
// Rôle :
//   - Injecter les styles globaux (globals + Leaflet, importés une seule fois).
//   - Poser le <Head> commun (viewport, theme-color, favicon, titre).
//
// Header / footer dépendent de l’état de la page (onglet actif, date du
// jeu) : ils sont rendus par la page elle-même.
// -----------------------------------------------------------------------------

import type { AppProps } from "next/app";
import Head from "next/head";

import "leaflet/dist/leaflet.css";
import "@/styles/globals.css";

export default function DashboardApp({ Component, pageProps }: AppProps) {
  return (
    <>
      <Head>
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <meta name="theme-color" content="#ffffff" media="(prefers-color-scheme: light)" />
        <meta name="theme-color" content="#0b1220" media="(prefers-color-scheme: dark)" />
        <link rel="icon" href="/favicon.svg" />
        <title>Fontaines RATP — Dashboard</title>
      </Head>

      <Component {...pageProps} />
    </>
  );
}
