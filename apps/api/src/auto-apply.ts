/**
 * Eligibility-driven application flows.
 *
 * - `checkSchemeEligibility` evaluates one farmer against one scheme.
 * - `autoApplyForScheme` sweeps every opted-in farmer after a scheme is added.
 *   Each farmer is handled on its own: one farmer failing never stops the
 *   sweep or undoes applications already created.
 * - `manualApplyForScheme` is the farmer-initiated path and reports a
 *   structured outcome instead of throwing for expected declines.
 *
 * The (farmer, scheme) unique constraint is the authoritative duplicate
 * check. Looking up an existing application first only avoids pointless
 * evaluations; a caller that loses the insert race reports ALREADY_APPLIED.
 */
import {
  DOCUMENT_TYPES,
  SkippedCriteriaPolicyEnum,
  type ApplicationOrigin,
  type EligibilityVerdict,
  type SkippedCriteriaPolicy,
} from "@agroscheme/shared";
import type { Farmer } from "./auth";
import { createApplicationWithRetry, type ApplicationRecord } from "./applications";
import { isApplicationConflictError } from "./application-errors";
import { getDocumentCatalog, type DocumentCatalog } from "./document-catalog";
import { deriveFarmerAttributes, evaluateEligibility } from "./eligibility";
import { PgEligibilityStore, type EligibilityStore } from "./eligibility-store";
import { runWithLogContext } from "./log-context";
import { logError, logInfo, logWarn } from "./logger";
import { notifyBestEffort } from "./notifications";
import { observeAutoApplySweep, recordEligibilityEvaluation } from "./observability/metrics";
import { withSpan } from "./observability/spans";
import type { Scheme } from "./schemes";

export interface EligibilityContext {
  store: EligibilityStore;
  catalog: DocumentCatalog;
  skippedCriteriaPolicy: SkippedCriteriaPolicy;
  now?: () => Date;
  generateApplicationId?: (now: Date) => string;
}

export function resolveSkippedCriteriaPolicy(): SkippedCriteriaPolicy {
  const configured = process.env.ELIGIBILITY_SKIPPED_CRITERIA;
  if (!configured) return "count-as-miss";
  const parsed = SkippedCriteriaPolicyEnum.safeParse(configured.trim().toLowerCase());
  if (parsed.success) return parsed.data;
  logWarn("Unknown ELIGIBILITY_SKIPPED_CRITERIA configured, using count-as-miss", { configured });
  return "count-as-miss";
}

export function createDefaultEligibilityContext(): EligibilityContext {
  return {
    store: new PgEligibilityStore(),
    catalog: getDocumentCatalog(),
    skippedCriteriaPolicy: resolveSkippedCriteriaPolicy(),
  };
}

function currentTime(ctx: EligibilityContext): Date {
  return ctx.now ? ctx.now() : new Date();
}

function notFoundVerdict(reason: string): EligibilityVerdict {
  return {
    eligible: false,
    criteriaMet: false,
    matchPercentage: 0,
    matchedCriteria: [],
    missingCriteria: [],
    unverifiedCriteria: [],
    reasons: [reason],
    hasRequiredDocuments: false,
    missingDocuments: [],
  };
}

async function evaluateFarmer(
  ctx: EligibilityContext,
  farmer: Farmer,
  scheme: Scheme,
  now: Date
): Promise<EligibilityVerdict> {
  const fieldSets = await ctx.store.getLatestFieldSets(farmer.id);
  const verdict = evaluateEligibility(
    {
      attributes: deriveFarmerAttributes(fieldSets, now),
      criteria: scheme.eligibility_criteria,
      requiredDocuments: scheme.required_documents,
      availableDocumentTypes: new Set(DOCUMENT_TYPES.filter((type) => fieldSets[type] !== undefined)),
    },
    ctx.catalog,
    { skippedCriteriaPolicy: ctx.skippedCriteriaPolicy }
  );
  recordEligibilityEvaluation(verdict.eligible ? "eligible" : "ineligible");
  return verdict;
}

export type EligibilityCheck =
  | { status: "EVALUATED"; scheme: Scheme; verdict: EligibilityVerdict }
  | { status: "FARMER_NOT_FOUND" | "SCHEME_NOT_FOUND"; verdict: EligibilityVerdict };

/** A missing farmer or scheme yields an ineligible verdict, never an exception. */
export async function checkSchemeEligibility(
  ctx: EligibilityContext,
  farmerId: number,
  schemeId: number
): Promise<EligibilityCheck> {
  const [farmer, scheme] = await Promise.all([ctx.store.getFarmer(farmerId), ctx.store.getScheme(schemeId)]);
  if (!farmer) {
    recordEligibilityEvaluation("not_found");
    return { status: "FARMER_NOT_FOUND", verdict: notFoundVerdict("Farmer not found") };
  }
  if (!scheme) {
    recordEligibilityEvaluation("not_found");
    return { status: "SCHEME_NOT_FOUND", verdict: notFoundVerdict("Scheme not found") };
  }
  const verdict = await evaluateFarmer(ctx, farmer, scheme, currentTime(ctx));
  return { status: "EVALUATED", scheme, verdict };
}

async function createApplication(
  ctx: EligibilityContext,
  farmer: Farmer,
  scheme: Scheme,
  origin: ApplicationOrigin,
  verdict: EligibilityVerdict,
  now: Date
): Promise<ApplicationRecord> {
  return createApplicationWithRetry(
    ctx.store,
    {
      farmerId: farmer.id,
      schemeId: scheme.id,
      origin,
      appliedAmount: scheme.benefit_amount ?? 0,
      applicationData: {
        schemeName: scheme.scheme_name,
        schemeCode: scheme.scheme_code,
        origin,
        appliedAt: now.toISOString(),
        eligibility: verdict,
      },
    },
    { now, generateId: ctx.generateApplicationId }
  );
}

export interface AutoApplySummary {
  schemeId: number;
  evaluated: number;
  created: ApplicationRecord[];
  alreadyApplied: number;
  ineligible: number;
  failed: number;
}

/**
 * Creates at most one application per opted-in, eligible farmer. Running
 * it again for the same scheme creates nothing new.
 */
export async function autoApplyForScheme(ctx: EligibilityContext, schemeId: number): Promise<AutoApplySummary> {
  return withSpan("auto_apply.sweep", { "scheme.id": schemeId }, async (span) => {
    const summary = await sweepScheme(ctx, schemeId);
    span.setAttributes({
      "auto_apply.evaluated": summary.evaluated,
      "auto_apply.created": summary.created.length,
      "auto_apply.failed": summary.failed,
    });
    return summary;
  });
}

async function sweepScheme(ctx: EligibilityContext, schemeId: number): Promise<AutoApplySummary> {
  const startedAt = Date.now();
  const summary: AutoApplySummary = {
    schemeId,
    evaluated: 0,
    created: [],
    alreadyApplied: 0,
    ineligible: 0,
    failed: 0,
  };

  const scheme = await ctx.store.getScheme(schemeId);
  if (!scheme) {
    logWarn("Auto-apply skipped: scheme not found", { schemeId });
    return summary;
  }
  if (!scheme.is_active) {
    logInfo("Auto-apply skipped: scheme inactive", { schemeId });
    return summary;
  }

  const farmers = await ctx.store.listAutoApplyFarmers();
  for (const farmer of farmers) {
    try {
      const existing = await ctx.store.findApplication(farmer.id, scheme.id);
      if (existing) {
        summary.alreadyApplied++;
        continue;
      }

      const now = currentTime(ctx);
      const verdict = await evaluateFarmer(ctx, farmer, scheme, now);
      summary.evaluated++;
      if (!verdict.eligible) {
        summary.ineligible++;
        continue;
      }

      const application = await createApplication(ctx, farmer, scheme, "AUTO", verdict, now);
      summary.created.push(application);

      await notifyBestEffort(ctx.store, {
        farmerId: farmer.id,
        title: `Auto-Applied: ${scheme.scheme_name}`,
        message: `You have been automatically enrolled in ${scheme.scheme_name} based on your documents. Application ID: ${application.application_id}`,
        type: "auto_apply",
        schemeId: scheme.id,
        applicationId: application.application_id,
      });
    } catch (error: unknown) {
      if (isApplicationConflictError(error, "FARMER_SCHEME")) {
        summary.alreadyApplied++;
        continue;
      }
      summary.failed++;
      logError("Auto-apply failed for farmer", {
        schemeId,
        farmerId: farmer.id,
        error: error instanceof Error ? error.message : "unknown_error",
      });
    }
  }

  const durationSeconds = (Date.now() - startedAt) / 1000;
  observeAutoApplySweep(durationSeconds);
  logInfo("Auto-apply sweep finished", {
    schemeId,
    farmers: farmers.length,
    evaluated: summary.evaluated,
    created: summary.created.length,
    alreadyApplied: summary.alreadyApplied,
    ineligible: summary.ineligible,
    failed: summary.failed,
    durationSeconds,
  });
  return summary;
}

/**
 * Runs a sweep after the current request has been answered. Errors are
 * logged; nothing is reported back to the caller.
 */
export function scheduleAutoApply(
  schemeId: number,
  ctx: EligibilityContext = createDefaultEligibilityContext()
): void {
  setImmediate(() => {
    runWithLogContext({ jobId: `auto-apply:${schemeId}` }, () => {
      autoApplyForScheme(ctx, schemeId).catch((error: unknown) => {
        logError("Auto-apply sweep failed", {
          schemeId,
          error: error instanceof Error ? error.message : "unknown_error",
        });
      });
    });
  });
}

export type ManualApplyResult =
  | { outcome: "APPLIED"; application: ApplicationRecord; verdict: EligibilityVerdict }
  | { outcome: "FARMER_NOT_FOUND" }
  | { outcome: "SCHEME_NOT_FOUND" }
  | { outcome: "SCHEME_INACTIVE" }
  | { outcome: "ALREADY_APPLIED"; applicationId: string }
  | { outcome: "INELIGIBLE"; verdict: EligibilityVerdict }
  | { outcome: "MISSING_DOCUMENTS"; verdict: EligibilityVerdict };

export async function manualApplyForScheme(
  ctx: EligibilityContext,
  farmerId: number,
  schemeId: number
): Promise<ManualApplyResult> {
  const farmer = await ctx.store.getFarmer(farmerId);
  if (!farmer) return { outcome: "FARMER_NOT_FOUND" };
  const scheme = await ctx.store.getScheme(schemeId);
  if (!scheme) return { outcome: "SCHEME_NOT_FOUND" };
  if (!scheme.is_active) return { outcome: "SCHEME_INACTIVE" };

  const existing = await ctx.store.findApplication(farmer.id, scheme.id);
  if (existing) return { outcome: "ALREADY_APPLIED", applicationId: existing.application_id };

  const now = currentTime(ctx);
  const verdict = await evaluateFarmer(ctx, farmer, scheme, now);
  if (!verdict.criteriaMet) return { outcome: "INELIGIBLE", verdict };
  if (!verdict.hasRequiredDocuments) return { outcome: "MISSING_DOCUMENTS", verdict };

  let application: ApplicationRecord;
  try {
    application = await createApplication(ctx, farmer, scheme, "MANUAL", verdict, now);
  } catch (error: unknown) {
    if (!isApplicationConflictError(error, "FARMER_SCHEME")) throw error;
    const winner = await ctx.store.findApplication(farmer.id, scheme.id);
    if (!winner) throw error;
    logInfo("Manual apply lost the insert race", { farmerId, schemeId, applicationId: winner.application_id });
    return { outcome: "ALREADY_APPLIED", applicationId: winner.application_id };
  }

  await notifyBestEffort(ctx.store, {
    farmerId: farmer.id,
    title: `Application Submitted: ${scheme.scheme_name}`,
    message: `Your application for ${scheme.scheme_name} has been submitted. Application ID: ${application.application_id}`,
    type: "application_submitted",
    schemeId: scheme.id,
    applicationId: application.application_id,
  });
  return { outcome: "APPLIED", application, verdict };
}
