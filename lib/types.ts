// lib/types.ts

// ─────────────────── Valeurs de référence ───────────────────
/** Lignes RER (identifiants lettres). Toute autre ligne est du métro. */
export const RER_LINES = ["A", "B", "C", "D", "E"] as const;

export type TransitType = "Métro" | "RER";
export type Region = "Paris" | "Banlieue";

/** Valeur substituée quand `zone_controlee` est vide. */
export const ZONE_UNSPECIFIED = "non renseigné";
/** Valeur observée pour les fontaines après validation du titre. */
export const ZONE_CONTROLLED = "en zone contrôlée";
/** Valeur substituée quand `nom_acces` est vide. */
export const ACCESS_UNSPECIFIED = "Non spécifié";

// ─────────────────── Fontaines ───────────────────
/** Une ligne brute du CSV, positionnelle (13 valeurs attendues). */
export type RawFountainRow = readonly string[];

export type FountainRecord = {
  ratpId: string
  lineId: string
  station: string
  longitude: number | null        // null si illisible dans le CSV
  latitude: number | null
  externalId: string              // id_idm (référentiel IDFM)
  address: string
  postalCode: number | null
  commune: string
  accessNumber: string
  accessName: string              // "Non spécifié" si absent
  controlledZoneStatus: string    // "non renseigné" si absent
  geoPoint: string                // "lat, lon" brut, non exploité
  // dérivés (calculés une seule fois à la préparation)
  transitType: TransitType
  region: Region
}

/** Jeu préparé : trié, gelé, partagé en lecture seule. */
export type FountainDataset = ReadonlyArray<Readonly<FountainRecord>>;

// ─────────────────── Filtres ───────────────────
export const ALL = "All";
export type All = typeof ALL;

export type TransitTypeChoice = All | TransitType;
// `string & {}` : une valeur hors domaine reste acceptée et ne matche rien
export type ZoneStatusChoice = All | typeof ZONE_CONTROLLED | typeof ZONE_UNSPECIFIED | (string & {});

export type FilterSelection = {
  /** Lignes retenues. Absent → toutes ; vide → aucune. */
  lines?: ReadonlySet<string> | readonly string[]
  transitType: TransitTypeChoice
  zoneStatus: ZoneStatusChoice
}

/** Champs catégoriels agrégeables par `countByCategory`. */
export type CategoricalField =
  | "controlledZoneStatus"
  | "transitType"
  | "region"
  | "commune"
  | "lineId"
  | "accessName";

// ─────────────────── API /api/fountains ───────────────────
export type ParseIssue = {
  row: number
  field: "postalCode" | "longitude" | "latitude"
  raw: string
}

export interface FountainsResponse {
  generated_at: string;   // ISO, date de préparation
  source: string;         // nom du fichier CSV (sans chemin)
  count: number;
  issues: ParseIssue[];
  rows: FountainRecord[];
}
