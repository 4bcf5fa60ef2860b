/**
 * Eligibility evaluation.
 *
 * Pure functions over a farmer's merged document fields, a scheme's criteria
 * and its required-document list. Storage, notification and application
 * creation live in auto-apply.ts.
 */
import {
  CRITERION_KEYS,
  type CriterionKey,
  type DocumentType,
  type EligibilityVerdict,
  type ExtractedFieldSet,
  type FarmerFieldSets,
  type SchemeCriteria,
  type SkippedCriteriaPolicy,
} from "@agroscheme/shared";
import type { DocumentCatalog } from "./document-catalog";
import { ACRES_PER_HECTARE } from "./extraction";
import { ageOn, parseNumber, roundTo } from "./field-parsers";

/** Transient merged view of a farmer's documents. Absent data stays absent. */
export interface FarmerAttributes {
  age?: number;
  annualIncome?: number;
  /** Acres. */
  landArea?: number;
  caste?: string;
  gender?: string;
}

function numberField(fields: ExtractedFieldSet | undefined, name: string): number | undefined {
  const value = fields?.[name];
  if (typeof value === "number") return value;
  if (typeof value === "string") {
    const outcome = parseNumber(value);
    return outcome.parsed ? outcome.value : undefined;
  }
  return undefined;
}

function stringField(fields: ExtractedFieldSet | undefined, name: string): string | undefined {
  const value = fields?.[name];
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

const DATE_OF_BIRTH_SOURCES: readonly DocumentType[] = ["aadhaar", "pan"];

export function deriveFarmerAttributes(fieldSets: FarmerFieldSets, asOf: Date): FarmerAttributes {
  const attributes: FarmerAttributes = {};

  for (const source of DATE_OF_BIRTH_SOURCES) {
    const dateOfBirth = stringField(fieldSets[source], "date_of_birth");
    const age = dateOfBirth ? ageOn(dateOfBirth, asOf) : null;
    if (age !== null) {
      attributes.age = age;
      break;
    }
  }

  const annualIncome = numberField(fieldSets.income_certificate, "annual_income");
  if (annualIncome !== undefined) attributes.annualIncome = annualIncome;

  const acres = numberField(fieldSets.land_record, "land_area_acres");
  const hectares = numberField(fieldSets.land_record, "land_area_hectares");
  if (acres !== undefined) {
    attributes.landArea = acres;
  } else if (hectares !== undefined) {
    attributes.landArea = roundTo(hectares * ACRES_PER_HECTARE, 4);
  }

  const caste = stringField(fieldSets.caste_certificate, "caste_category");
  if (caste) attributes.caste = caste;

  const gender = stringField(fieldSets.aadhaar, "gender");
  if (gender) attributes.gender = gender;

  return attributes;
}

export interface DocumentCoverage {
  hasRequiredDocuments: boolean;
  missingDocuments: string[];
}

/**
 * A requirement is covered when some document type the farmer has on file
 * lists a keyword that occurs in the requirement text (case-insensitive).
 * Catalog order decides which type is tried first.
 */
export function checkRequiredDocuments(
  requiredDocuments: readonly string[],
  availableDocumentTypes: ReadonlySet<DocumentType>,
  catalog: DocumentCatalog
): DocumentCoverage {
  const missingDocuments = requiredDocuments.filter((requirement) => {
    const text = requirement.toLowerCase();
    const covered = catalog.definitions.some(
      (definition) =>
        availableDocumentTypes.has(definition.type) &&
        definition.keywords.some((keyword) => text.includes(keyword.toLowerCase()))
    );
    return !covered;
  });
  return { hasRequiredDocuments: missingDocuments.length === 0, missingDocuments };
}

type CriterionResult =
  | { status: "matched" }
  | { status: "failed"; reason: string }
  | { status: "skipped"; reason: string };

const MATCHED: CriterionResult = { status: "matched" };

function skipped(key: CriterionKey, attribute: string): CriterionResult {
  return { status: "skipped", reason: `${key}: no ${attribute} data on file` };
}

function checkCriterion(
  key: CriterionKey,
  criteria: SchemeCriteria,
  attributes: FarmerAttributes
): CriterionResult | null {
  switch (key) {
    case "age_min": {
      const min = criteria.age_min;
      if (min === undefined) return null;
      if (attributes.age === undefined) return skipped(key, "age");
      return attributes.age >= min
        ? MATCHED
        : { status: "failed", reason: `Age ${attributes.age} is below the minimum of ${min}` };
    }
    case "age_max": {
      const max = criteria.age_max;
      if (max === undefined) return null;
      if (attributes.age === undefined) return skipped(key, "age");
      return attributes.age <= max
        ? MATCHED
        : { status: "failed", reason: `Age ${attributes.age} is above the maximum of ${max}` };
    }
    case "annual_income_max": {
      const max = criteria.annual_income_max;
      if (max === undefined) return null;
      if (attributes.annualIncome === undefined) return skipped(key, "income");
      return attributes.annualIncome <= max
        ? MATCHED
        : {
            status: "failed",
            reason: `Annual income ${attributes.annualIncome} exceeds the limit of ${max}`,
          };
    }
    case "land_holding_min": {
      const min = criteria.land_holding_min;
      if (min === undefined) return null;
      if (attributes.landArea === undefined) return skipped(key, "land holding");
      return attributes.landArea >= min
        ? MATCHED
        : {
            status: "failed",
            reason: `Land holding ${attributes.landArea} acres is below the minimum of ${min} acres`,
          };
    }
    case "caste_allowed": {
      const allowed = criteria.caste_allowed;
      if (allowed === undefined) return null;
      const caste = attributes.caste;
      if (caste === undefined) return skipped(key, "caste");
      const isAllowed = allowed.some((entry) => entry.toLowerCase() === caste.toLowerCase());
      return isAllowed
        ? MATCHED
        : {
            status: "failed",
            reason: `Caste category ${caste} is not one of ${allowed.join(", ")}`,
          };
    }
    case "gender": {
      const required = criteria.gender;
      if (required === undefined) return null;
      if (required.toLowerCase() === "all") return MATCHED;
      if (attributes.gender === undefined) return skipped(key, "gender");
      return attributes.gender.toLowerCase() === required.toLowerCase()
        ? MATCHED
        : {
            status: "failed",
            reason: `Gender ${attributes.gender} does not match the required ${required}`,
          };
    }
  }
}

export interface EligibilityInput {
  attributes: FarmerAttributes;
  criteria: SchemeCriteria;
  requiredDocuments: readonly string[];
  availableDocumentTypes: ReadonlySet<DocumentType>;
}

export interface EvaluationOptions {
  skippedCriteriaPolicy: SkippedCriteriaPolicy;
}

export function evaluateEligibility(
  input: EligibilityInput,
  catalog: DocumentCatalog,
  options: EvaluationOptions
): EligibilityVerdict {
  const matchedCriteria: string[] = [];
  const missingCriteria: string[] = [];
  const unverifiedCriteria: string[] = [];
  const failureReasons: string[] = [];
  const skipReasons: string[] = [];

  for (const key of CRITERION_KEYS) {
    const result = checkCriterion(key, input.criteria, input.attributes);
    if (!result) continue;
    if (result.status === "matched") {
      matchedCriteria.push(key);
    } else if (result.status === "failed") {
      missingCriteria.push(key);
      failureReasons.push(result.reason);
    } else {
      unverifiedCriteria.push(key);
      skipReasons.push(result.reason);
    }
  }

  const evaluated = matchedCriteria.length + missingCriteria.length;
  const denominator =
    options.skippedCriteriaPolicy === "count-as-miss"
      ? evaluated + unverifiedCriteria.length
      : evaluated;
  const matchPercentage =
    denominator === 0 ? 100 : roundTo((matchedCriteria.length / denominator) * 100, 2);

  const coverage = checkRequiredDocuments(
    input.requiredDocuments,
    input.availableDocumentTypes,
    catalog
  );
  const criteriaMet = missingCriteria.length === 0;

  const reasons = [...failureReasons, ...skipReasons];
  if (!coverage.hasRequiredDocuments) {
    reasons.push(`Missing required documents: ${coverage.missingDocuments.join(", ")}`);
  }

  return {
    eligible: criteriaMet && coverage.hasRequiredDocuments,
    criteriaMet,
    matchPercentage,
    matchedCriteria,
    missingCriteria,
    unverifiedCriteria,
    reasons,
    hasRequiredDocuments: coverage.hasRequiredDocuments,
    missingDocuments: coverage.missingDocuments,
  };
}
