/**
 * Eligibility verdict. Computed on demand and never stored on its own; a
 * copy is embedded in the application data when a farmer applies.
 *
 * - `criteriaMet` is the criteria gate alone.
 * - `eligible` also requires every scheme document to be on file.
 * - `unverifiedCriteria` lists criteria skipped because the farmer has no
 *   data for them. They never disqualify.
 */
import { z } from "zod";

export const EligibilityVerdictSchema = z.object({
  eligible: z.boolean(),
  criteriaMet: z.boolean(),
  matchPercentage: z.number().min(0).max(100),
  matchedCriteria: z.array(z.string()),
  missingCriteria: z.array(z.string()),
  unverifiedCriteria: z.array(z.string()),
  reasons: z.array(z.string()),
  hasRequiredDocuments: z.boolean(),
  missingDocuments: z.array(z.string()),
});

export type EligibilityVerdict = z.infer<typeof EligibilityVerdictSchema>;

export const SkippedCriteriaPolicyEnum = z.enum(["count-as-miss", "exclude"]);

export type SkippedCriteriaPolicy = z.infer<typeof SkippedCriteriaPolicyEnum>;
