import { z } from "zod";
import { renameLegacyKeys } from "./legacy-keys.js";

const normalizeLegacyRuleKeys = renameLegacyKeys({
  xpath: "target_location",
  source_field: "source_key",
  parent_xpath: "parent_location",
});

/**
 * One correction rule.
 *
 * Locators are only checked for being strings here: a malformed locator is a
 * per-rule failure at correction time, reported by lintRuleSet() beforehand.
 * `position` is accepted for compatibility and ignored (new elements are
 * always appended as the parent's last child).
 */
export const CorrectionRule = z.preprocess(
  normalizeLegacyRuleKeys,
  z.object({
    name: z.string().trim().min(1),
    target_location: z.string(),
    source_key: z.string().min(1),
    condition: z.string().min(1).optional(),
    parent_location: z.string().optional(),
    group: z.string().optional(),
    description: z.string().optional(),
    action: z.literal("create_or_update").optional(),
    position: z.string().optional(),
  })
);

export type CorrectionRuleT = z.infer<typeof CorrectionRule>;

export const RuleSet = z.array(CorrectionRule).superRefine((rules, ctx) => {
  const seen = new Map<string, number>();
  rules.forEach((rule, index) => {
    const first = seen.get(rule.name);
    if (first !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, "name"],
        message: `Duplicate rule name "${rule.name}" (first defined at index ${first})`,
      });
      return;
    }
    seen.set(rule.name, index);
  });
});

export type RuleSetT = ReadonlyArray<CorrectionRuleT>;
