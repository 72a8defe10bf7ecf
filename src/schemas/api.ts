import { z } from "zod";
import { RuleSet } from "./rules.js";

/** Scalar fact values accepted over HTTP */
const FactValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const CorrectionRequestBody = z.object({
  xml: z.string().min(1),
  order_id: z.string().trim().min(1).optional(),
  facts: z.record(FactValue).optional(),
  rules: RuleSet.optional(),
  file_name: z.string().trim().min(1).optional(),
});

export type CorrectionRequestBodyT = z.infer<typeof CorrectionRequestBody>;

export const BatchCorrectionRequestBody = z.object({
  documents: z
    .array(
      z.object({
        file_name: z.string().trim().min(1),
        xml: z.string().min(1),
      })
    )
    .min(1),
  agency: z.string().trim().min(1).optional(),
});

export const OrdersImportBody = z.object({
  csv: z.string().min(1),
  source: z.string().trim().min(1).optional(),
});

export const EmailExtractBody = z.object({
  text: z.string().min(1),
});

export const OrderIdParams = z.object({
  orderId: z.string().trim().min(1),
});
