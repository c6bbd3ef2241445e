// pages/_document.tsx
// -----------------------------------------------------------------------------
// Custom Document (Next.js) : structure HTML racine, langue du document.
// La feuille Leaflet est importée depuis le paquet npm dans `_app.tsx`.
// -----------------------------------------------------------------------------

import Document, { Html, Head, Main, NextScript } from "next/document";

export default class DashboardDocument extends Document {
  render() {
    return (
      <Html lang="fr">
        <Head>
          <meta name="description" content="Analyse des fontaines à eau installées dans le réseau RATP (métro et RER)." />
        </Head>
        <body>
          <Main />
          <NextScript />
        </body>
      </Html>
    );
  }
}
