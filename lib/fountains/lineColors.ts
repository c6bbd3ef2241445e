// lib/fountains/lineColors.ts
//
// Couleurs officielles des lignes (carte + légende). Les lignes absentes de
// la table retombent sur un gris neutre.

export const LINE_COLORS: Readonly<Record<string, string>> = {
  "1": "#FFCD00",
  "2": "#0064B0",
  "3": "#9F9825",
  "3bis": "#98D4E2",
  "4": "#C04191",
  "5": "#F28E42",
  "6": "#83C491",
  "7": "#F3A4BA",
  "7bis": "#83C491",
  "8": "#CEADD2",
  "9": "#D5C900",
  "10": "#E3B32A",
  "11": "#8D5E2A",
  "12": "#00814F",
  "13": "#82C8E6",
  "14": "#8B5EA8",
  A: "#E3051C",
  B: "#5291CE",
  C: "#FFCE00",
  D: "#00814F",
  E: "#C04191",
};

export const FALLBACK_LINE_COLOR = "#9aa0a6";

export const lineColor = (lineId: string): string =>
  LINE_COLORS[lineId] ?? FALLBACK_LINE_COLOR;
