import { describe, expect, it } from "vitest";
import type { DocumentType } from "@agroscheme/shared";
import { loadDocumentCatalog } from "./document-catalog";
import {
  checkRequiredDocuments,
  deriveFarmerAttributes,
  evaluateEligibility,
  type EligibilityInput,
} from "./eligibility";
import { buildTestCatalog } from "./catalog.test-helpers";

const catalog = loadDocumentCatalog();
const countAsMiss = { skippedCriteriaPolicy: "count-as-miss" } as const;
const exclude = { skippedCriteriaPolicy: "exclude" } as const;

function input(overrides: Partial<EligibilityInput>): EligibilityInput {
  return {
    attributes: {},
    criteria: {},
    requiredDocuments: [],
    availableDocumentTypes: new Set<DocumentType>(),
    ...overrides,
  };
}

describe("evaluateEligibility", () => {
  it("passes everyone when a scheme has no criteria", () => {
    const verdict = evaluateEligibility(input({ attributes: { age: 70 } }), catalog, countAsMiss);

    expect(verdict.matchPercentage).toBe(100);
    expect(verdict.eligible).toBe(true);
    expect(verdict.reasons).toEqual([]);
  });

  it("matches an income under the ceiling", () => {
    const verdict = evaluateEligibility(
      input({ attributes: { annualIncome: 50000 }, criteria: { annual_income_max: 100000 } }),
      catalog,
      countAsMiss
    );

    expect(verdict.matchedCriteria).toEqual(["annual_income_max"]);
    expect(verdict.missingCriteria).toEqual([]);
    expect(verdict.matchPercentage).toBe(100);
    expect(verdict.eligible).toBe(true);
  });

  it("disqualifies a 17-year-old from an 18+ scheme", () => {
    const verdict = evaluateEligibility(
      input({ attributes: { age: 17 }, criteria: { age_min: 18 } }),
      catalog,
      countAsMiss
    );

    expect(verdict.missingCriteria).toEqual(["age_min"]);
    expect(verdict.reasons).toEqual(["Age 17 is below the minimum of 18"]);
    expect(verdict.criteriaMet).toBe(false);
    expect(verdict.eligible).toBe(false);
    expect(verdict.matchPercentage).toBe(0);
  });

  it("gates on documents independently of criteria", () => {
    const verdict = evaluateEligibility(
      input({
        attributes: { annualIncome: 50000 },
        criteria: { annual_income_max: 100000 },
        requiredDocuments: ["Land Record", "Income Certificate"],
        availableDocumentTypes: new Set<DocumentType>(["land_record"]),
      }),
      catalog,
      countAsMiss
    );

    expect(verdict.criteriaMet).toBe(true);
    expect(verdict.hasRequiredDocuments).toBe(false);
    expect(verdict.missingDocuments).toEqual(["Income Certificate"]);
    expect(verdict.eligible).toBe(false);
    expect(verdict.reasons).toEqual(["Missing required documents: Income Certificate"]);
  });

  it("rounds the match percentage to two decimals", () => {
    const verdict = evaluateEligibility(
      input({
        attributes: { age: 65, annualIncome: 200000 },
        criteria: { age_min: 18, age_max: 60, annual_income_max: 100000 },
      }),
      catalog,
      countAsMiss
    );

    expect(verdict.matchedCriteria).toEqual(["age_min"]);
    expect(verdict.missingCriteria).toEqual(["age_max", "annual_income_max"]);
    expect(verdict.matchPercentage).toBe(33.33);
    expect(verdict.reasons).toEqual([
      "Age 65 is above the maximum of 60",
      "Annual income 200000 exceeds the limit of 100000",
    ]);
  });

  describe("criteria the farmer has no data for", () => {
    const partial = input({
      attributes: { annualIncome: 50000 },
      criteria: { age_min: 18, annual_income_max: 100000 },
    });

    it("never disqualifies and is reported as unverified", () => {
      const verdict = evaluateEligibility(partial, catalog, countAsMiss);

      expect(verdict.eligible).toBe(true);
      expect(verdict.missingCriteria).toEqual([]);
      expect(verdict.unverifiedCriteria).toEqual(["age_min"]);
      expect(verdict.reasons).toEqual(["age_min: no age data on file"]);
    });

    it("stays in the denominator under count-as-miss", () => {
      expect(evaluateEligibility(partial, catalog, countAsMiss).matchPercentage).toBe(50);
    });

    it("leaves the denominator under exclude", () => {
      expect(evaluateEligibility(partial, catalog, exclude).matchPercentage).toBe(100);
    });

    it("reports 100 under exclude when nothing could be evaluated", () => {
      const verdict = evaluateEligibility(
        input({ criteria: { age_min: 18, land_holding_min: 1 } }),
        catalog,
        exclude
      );
      expect(verdict.matchPercentage).toBe(100);
      expect(verdict.unverifiedCriteria).toEqual(["age_min", "land_holding_min"]);
    });

    it("reports 0 under count-as-miss when nothing could be evaluated", () => {
      const verdict = evaluateEligibility(input({ criteria: { age_min: 18 } }), catalog, countAsMiss);
      expect(verdict.matchPercentage).toBe(0);
      expect(verdict.eligible).toBe(true);
    });
  });

  it("matches gender 'all' without any gender data", () => {
    const verdict = evaluateEligibility(input({ criteria: { gender: "All" } }), catalog, countAsMiss);
    expect(verdict.matchedCriteria).toEqual(["gender"]);
  });

  it("compares gender and caste case-insensitively", () => {
    const verdict = evaluateEligibility(
      input({
        attributes: { gender: "Female", caste: "obc" },
        criteria: { gender: "female", caste_allowed: ["SC", "ST", "OBC"] },
      }),
      catalog,
      countAsMiss
    );
    expect(verdict.matchedCriteria).toEqual(["caste_allowed", "gender"]);
  });

  it("explains a caste and land-holding mismatch", () => {
    const verdict = evaluateEligibility(
      input({
        attributes: { caste: "General", landArea: 0.5 },
        criteria: { caste_allowed: ["SC", "ST"], land_holding_min: 1 },
      }),
      catalog,
      countAsMiss
    );
    expect(verdict.reasons).toEqual([
      "Land holding 0.5 acres is below the minimum of 1 acres",
      "Caste category General is not one of SC, ST",
    ]);
  });
});

describe("checkRequiredDocuments", () => {
  it("matches requirement text by keyword, case-insensitively", () => {
    const coverage = checkRequiredDocuments(
      ["7/12 Extract", "Aadhaar Card", "Bank Passbook copy"],
      new Set<DocumentType>(["land_record", "aadhaar", "bank_passbook"]),
      catalog
    );
    expect(coverage).toEqual({ hasRequiredDocuments: true, missingDocuments: [] });
  });

  it("needs the matching document type to be on file", () => {
    const coverage = checkRequiredDocuments(["Caste Certificate"], new Set<DocumentType>(["aadhaar"]), catalog);
    expect(coverage.missingDocuments).toEqual(["Caste Certificate"]);
  });

  it("uses the keywords of a substituted catalog", () => {
    const substitute = buildTestCatalog({ income_certificate: { keywords: ["salary"] } });
    const available = new Set<DocumentType>(["income_certificate"]);

    expect(checkRequiredDocuments(["Salary slip"], available, substitute).missingDocuments).toEqual([]);
    expect(checkRequiredDocuments(["Income Certificate"], available, substitute).missingDocuments).toEqual([
      "Income Certificate",
    ]);
  });
});

describe("deriveFarmerAttributes", () => {
  const asOf = new Date("2026-06-15T00:00:00.000Z");

  it("merges attributes across document types", () => {
    const attributes = deriveFarmerAttributes(
      {
        aadhaar: { date_of_birth: "2000-06-16", gender: "Male" },
        income_certificate: { annual_income: 85000 },
        land_record: { land_area_acres: 3.5, land_area_hectares: 1.417 },
        caste_certificate: { caste_category: "OBC" },
      },
      asOf
    );

    expect(attributes).toEqual({
      age: 25,
      annualIncome: 85000,
      landArea: 3.5,
      caste: "OBC",
      gender: "Male",
    });
  });

  it("falls back to the PAN date of birth when Aadhaar's is not a date", () => {
    const attributes = deriveFarmerAttributes(
      { aadhaar: { date_of_birth: "15 Aug 198" }, pan: { date_of_birth: "1990-01-01" } },
      asOf
    );
    expect(attributes.age).toBe(36);
  });

  it("converts hectares to acres when acres are absent", () => {
    const attributes = deriveFarmerAttributes({ land_record: { land_area_hectares: 2 } }, asOf);
    expect(attributes.landArea).toBe(4.94);
  });

  it("reads a numeric string income", () => {
    const attributes = deriveFarmerAttributes({ income_certificate: { annual_income: "1,20,000" } }, asOf);
    expect(attributes.annualIncome).toBe(120000);
  });

  it("omits attributes with no source", () => {
    expect(deriveFarmerAttributes({ domicile: { full_name: "Ramesh Patil" } }, asOf)).toEqual({});
  });
});
