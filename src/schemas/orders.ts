import { z } from "zod";
import { RuleSet } from "./rules.js";
import { renameLegacyKeys } from "./legacy-keys.js";

/**
 * One order as persisted in the orders file. Field values are kept as the
 * import produced them; extra columns are preserved.
 */
export const OrderRecord = z
  .object({
    order_id: z.string().trim().min(1),
    client: z.string().optional(),
    code_agence: z.string().optional(),
    emploi_cc: z.string().optional(),
    categorie_socio: z.string().optional(),
    classement_cc: z.string().optional(),
    centre_analyse: z.string().optional(),
    centre_analyse_prefix: z.string().optional(),
    siret_client: z.string().optional(),
    site_mission: z.string().optional(),
    date_debut: z.string().optional(),
    date_fin: z.string().optional(),
    nom_fichier: z.string().optional(),
    timestamp_traitement: z.string().optional(),
    site_not_gemenos: z.boolean().optional(),
    last_updated: z.string().optional(),
  })
  .passthrough();

export type OrderRecordT = z.infer<typeof OrderRecord>;

export const OrderStatistics = z.preprocess(
  renameLegacyKeys({
    total_commandes: "total_orders",
    codes_agence_uniques: "unique_agency_codes",
    emplois_cc_uniques: "unique_job_codes",
    categories_socio_uniques: "unique_socio_categories",
    classements_cc_uniques: "unique_classifications",
    repartition_par_agence: "orders_per_agency",
    derniere_mise_a_jour: "updated_at",
  }),
  z.object({
    total_orders: z.number().int().nonnegative(),
    unique_agency_codes: z.array(z.string()),
    unique_job_codes: z.array(z.string()),
    unique_socio_categories: z.array(z.string()).default([]),
    unique_classifications: z.array(z.string()).default([]),
    orders_per_agency: z.record(z.number().int().nonnegative()).default({}),
    updated_at: z.string().optional(),
  })
);

export type OrderStatisticsT = z.infer<typeof OrderStatistics>;

export const OrdersMetadata = z
  .object({
    last_updated: z.string(),
    version: z.string(),
    client: z.string(),
    source: z.string(),
  })
  .passthrough();

export type OrdersMetadataT = z.infer<typeof OrdersMetadata>;

/**
 * Orders file. Without a `rules` section the built-in rule set applies.
 */
export const OrdersFile = z.preprocess(
  renameLegacyKeys({
    commandes: "orders",
    regles_xml: "rules",
    statistiques: "statistics",
  }),
  z.object({
    metadata: OrdersMetadata,
    orders: z.array(OrderRecord),
    rules: RuleSet.optional(),
    statistics: OrderStatistics.optional(),
  })
);

export type OrdersFileT = z.infer<typeof OrdersFile>;
