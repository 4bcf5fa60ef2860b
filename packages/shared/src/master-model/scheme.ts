/**
 * Scheme model and its declarative eligibility criteria.
 *
 * Criteria use a fixed vocabulary. Unknown keys are stripped on parse, so a
 * scheme carrying a criterion this service does not understand never
 * disqualifies anybody because of it.
 */
import { z } from "zod";
import { ISODate, NonEmptyString, NonNegativeAmount } from "./primitives";

export const CRITERION_KEYS = [
  "age_min",
  "age_max",
  "annual_income_max",
  "land_holding_min",
  "caste_allowed",
  "gender",
] as const;

export type CriterionKey = (typeof CRITERION_KEYS)[number];

export const SchemeCriteriaSchema = z.object({
  age_min: z.number().int().min(0).optional(),
  age_max: z.number().int().min(0).optional(),
  annual_income_max: NonNegativeAmount.optional(),
  land_holding_min: NonNegativeAmount.optional(),
  caste_allowed: z.array(NonEmptyString).min(1).optional(),
  gender: NonEmptyString.optional(),
});

export type SchemeCriteria = z.infer<typeof SchemeCriteriaSchema>;

export const SchemeCodeSchema = z
  .string()
  .regex(/^[A-Z0-9][A-Z0-9_-]{1,39}$/, "Upper-case letters, digits, '_' or '-' (2-40 chars)");

export const CreateSchemeInputSchema = z.object({
  schemeName: NonEmptyString.max(200),
  schemeCode: SchemeCodeSchema,
  description: z.string().max(5000).optional(),
  schemeType: z.string().max(100).optional(),
  department: z.string().max(200).optional(),
  benefitAmount: NonNegativeAmount.nullable().optional(),
  lastDate: ISODate.optional(),
  isActive: z.boolean().default(true),
  eligibilityCriteria: SchemeCriteriaSchema.default({}),
  requiredDocuments: z.array(NonEmptyString.max(200)).max(20).default([]),
});

export type CreateSchemeInput = z.input<typeof CreateSchemeInputSchema>;
export type ParsedCreateSchemeInput = z.output<typeof CreateSchemeInputSchema>;
