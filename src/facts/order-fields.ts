/**
 * Order fields as they appear in spreadsheet headers and email bodies,
 * and the normalization both sources share.
 */

import { normalizeFactValue } from "./fact-record.js";

export interface OrderField {
  key: string;
  /** Spreadsheet column header */
  column: string;
  /** Other labels seen in emails */
  aliases?: ReadonlyArray<string>;
}

export const ORDER_FIELDS: ReadonlyArray<OrderField> = [
  { key: "order_id", column: "Numéro Commande", aliases: ["Numéro de commande", "N° commande", "Commande", "Order Id"] },
  { key: "code_agence", column: "Code Agence", aliases: ["Agence"] },
  { key: "emploi_cc", column: "Emploi CC", aliases: ["Emploi"] },
  { key: "categorie_socio", column: "Catégorie Socio", aliases: ["Catégorie socioprofessionnelle", "Catégorie"] },
  { key: "classement_cc", column: "Classement CC", aliases: ["Classement", "Coefficient"] },
  { key: "centre_analyse", column: "Centre Analyse", aliases: ["Centre d'analyse", "Centre de coût"] },
  { key: "siret_client", column: "SIRET Client", aliases: ["SIRET"] },
  { key: "site_mission", column: "Site Mission", aliases: ["Site de mission", "Site"] },
  { key: "date_debut", column: "Date Début", aliases: ["Date de début", "Début"] },
  { key: "date_fin", column: "Date Fin", aliases: ["Date de fin", "Fin"] },
  { key: "nom_fichier", column: "Nom Fichier" },
  { key: "timestamp_traitement", column: "Timestamp" },
];

const DATE_FIELDS = new Set(["date_debut", "date_fin"]);

/**
 * Lower-case, accent-free, single-spaced form used to compare labels.
 */
export function normalizeLabel(label: string): string {
  return label
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/\s+/g, " ")
    .trim();
}

const FIELD_BY_LABEL: ReadonlyMap<string, string> = new Map(
  ORDER_FIELDS.flatMap(field =>
    [field.column, ...(field.aliases ?? [])].map(label => [normalizeLabel(label), field.key] as const)
  )
);

export function fieldForLabel(label: string): string | undefined {
  return FIELD_BY_LABEL.get(normalizeLabel(label));
}

/**
 * "1FRA / PLADI/BP/PST04" -> "1FRA": first whitespace-separated token, cut at
 * its first slash.
 */
export function extractCentreAnalysePrefix(centreAnalyse: string): string {
  const first = centreAnalyse.trim().split(/\s+/)[0] ?? "";
  return first.split("/")[0].trim();
}

/**
 * DD/MM/YYYY -> YYYY-MM-DD. Timestamps (anything containing "T") and other
 * shapes are returned unchanged.
 */
export function formatDate(value: string): string {
  const text = value.trim();
  if (text.includes("T")) {
    return text;
  }
  const parts = text.split("/");
  if (parts.length !== 3) {
    return text;
  }
  const [day, month, year] = parts.map(part => part.trim());
  return `${year}-${month.padStart(2, "0")}-${day.padStart(2, "0")}`;
}

/**
 * Clean raw field values (trim, drop placeholders), format dates and derive
 * `centre_analyse_prefix`. Keys keep the order of ORDER_FIELDS.
 */
export function normalizeOrderFields(raw: Readonly<Record<string, string>>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const field of ORDER_FIELDS) {
    const value = normalizeFactValue(raw[field.key]);
    if (value === undefined) continue;
    out[field.key] = DATE_FIELDS.has(field.key) ? formatDate(value) : value;
    if (field.key === "centre_analyse") {
      const prefix = normalizeFactValue(extractCentreAnalysePrefix(value));
      if (prefix !== undefined) {
        out.centre_analyse_prefix = prefix;
      }
    }
  }
  return out;
}
