import { randomBytes } from "crypto";
import { z } from "zod";
import {
  ApplicationOriginEnum,
  ApplicationStatusEnum,
  EligibilityVerdictSchema,
  ISODateTime,
  StatusHistorySchema,
  canTransitionStatus,
  type ApplicationOrigin,
  type ApplicationStatus,
  type StatusChange,
  type UpdateApplicationStatusInput,
} from "@agroscheme/shared";
import { getClient, query } from "./db";
import {
  ApplicationIdExhaustedError,
  isApplicationConflictError,
} from "./application-errors";
import { logInfo, logWarn } from "./logger";
import { notifyBestEffort, pgNotificationSink, type NotificationSink } from "./notifications";
import { recordApplicationCreated, recordApplicationIdCollision } from "./observability/metrics";

/** Snapshot stored with every application for audit. */
export const ApplicationDataSchema = z.object({
  schemeName: z.string(),
  schemeCode: z.string(),
  origin: ApplicationOriginEnum,
  appliedAt: ISODateTime,
  eligibility: EligibilityVerdictSchema,
});

export type ApplicationData = z.infer<typeof ApplicationDataSchema>;

export interface ApplicationRecord {
  id: number;
  application_id: string;
  farmer_id: number;
  scheme_id: number;
  origin: ApplicationOrigin;
  status: ApplicationStatus;
  applied_amount: number;
  approved_amount: number | null;
  admin_remarks: string | null;
  application_data: ApplicationData;
  status_history: StatusChange[];
  created_at: Date;
  updated_at: Date;
}

/** Row as returned by pg: NUMERIC columns arrive as strings, jsonb as parsed JSON. */
export type ApplicationRow = {
  id: number;
  application_id: string;
  farmer_id: number;
  scheme_id: number;
  origin: string;
  status: string;
  applied_amount: string | number;
  approved_amount: string | number | null;
  admin_remarks: string | null;
  application_data: unknown;
  status_history: unknown;
  created_at: Date;
  updated_at: Date;
};

export const APPLICATION_COLUMNS =
  "id, application_id, farmer_id, scheme_id, origin, status, applied_amount, approved_amount, admin_remarks, application_data, status_history, created_at, updated_at";

export function rowToApplication(row: ApplicationRow): ApplicationRecord {
  return {
    id: row.id,
    application_id: row.application_id,
    farmer_id: row.farmer_id,
    scheme_id: row.scheme_id,
    origin: ApplicationOriginEnum.parse(row.origin),
    status: ApplicationStatusEnum.parse(row.status),
    applied_amount: Number(row.applied_amount),
    approved_amount: row.approved_amount === null ? null : Number(row.approved_amount),
    admin_remarks: row.admin_remarks,
    application_data: ApplicationDataSchema.parse(row.application_data),
    status_history: StatusHistorySchema.parse(row.status_history),
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

// ── Creation ──

/** Everything the caller decides about a new application. */
export interface ApplicationDraft {
  farmerId: number;
  schemeId: number;
  origin: ApplicationOrigin;
  appliedAmount: number;
  applicationData: ApplicationData;
}

export interface NewApplication extends ApplicationDraft {
  applicationId: string;
  status: "PENDING";
  statusHistory: StatusChange[];
}

export interface ApplicationWriter {
  /**
   * Inserts in its own commit. Unique violations surface as
   * `ApplicationConflictError`; anything else propagates unchanged.
   */
  insertApplication(application: NewApplication): Promise<ApplicationRecord>;
}

/**
 * Total inserts tried for one application, each with a freshly generated
 * identifier: the first insert plus two regenerations after a collision.
 */
export const MAX_APPLICATION_ID_INSERTS = 3;

/** `APP` + UTC `YYYYMMDD` + 6 upper-case hex characters. */
export function generateApplicationId(now: Date): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  return `APP${datePart}${randomBytes(3).toString("hex").toUpperCase()}`;
}

export interface CreateApplicationOptions {
  now: Date;
  generateId?: (now: Date) => string;
}

/**
 * Inserts a PENDING application, regenerating the identifier on an
 * identifier collision. A (farmer, scheme) conflict is rethrown to the
 * caller untouched.
 */
export async function createApplicationWithRetry(
  writer: ApplicationWriter,
  draft: ApplicationDraft,
  options: CreateApplicationOptions
): Promise<ApplicationRecord> {
  const generateId = options.generateId ?? generateApplicationId;
  const initialEntry: StatusChange = {
    status: "PENDING",
    timestamp: options.now.toISOString(),
    approvedAmount: null,
  };
  for (let attempt = 1; attempt <= MAX_APPLICATION_ID_INSERTS; attempt++) {
    const applicationId = generateId(options.now);
    try {
      const created = await writer.insertApplication({
        ...draft,
        applicationId,
        status: "PENDING",
        statusHistory: [initialEntry],
      });
      recordApplicationCreated(draft.origin);
      logInfo("Application created", {
        applicationId: created.application_id,
        farmerId: draft.farmerId,
        schemeId: draft.schemeId,
        origin: draft.origin,
      });
      return created;
    } catch (error: unknown) {
      if (!isApplicationConflictError(error, "APPLICATION_ID")) throw error;
      recordApplicationIdCollision();
      logWarn("Application identifier collision, regenerating", { applicationId, attempt });
    }
  }
  throw new ApplicationIdExhaustedError(MAX_APPLICATION_ID_INSERTS);
}

// ── Reads ──

export async function getApplicationById(applicationId: string): Promise<ApplicationRecord | null> {
  const result = await query<ApplicationRow>(
    `SELECT ${APPLICATION_COLUMNS} FROM application WHERE application_id = $1`,
    [applicationId]
  );
  return result.rows.length > 0 ? rowToApplication(result.rows[0]) : null;
}

export async function listFarmerApplications(
  farmerId: number,
  status?: ApplicationStatus,
  limit: number = 50,
  offset: number = 0
): Promise<ApplicationRecord[]> {
  const params: unknown[] = [farmerId];
  let sql = `SELECT ${APPLICATION_COLUMNS} FROM application WHERE farmer_id = $1`;
  if (status) {
    params.push(status);
    sql += ` AND status = $${params.length}`;
  }
  params.push(limit, offset);
  sql += ` ORDER BY created_at DESC LIMIT $${params.length - 1} OFFSET $${params.length}`;

  const result = await query<ApplicationRow>(sql, params);
  return result.rows.map(rowToApplication);
}

export interface ApplicationListFilter {
  status?: ApplicationStatus;
  schemeId?: number;
  limit?: number;
  offset?: number;
}

/** All farmers' applications for the admin review queue, newest first. */
export async function listApplications(filter: ApplicationListFilter = {}): Promise<ApplicationRecord[]> {
  const params: unknown[] = [];
  const conditions: string[] = [];
  if (filter.status) {
    params.push(filter.status);
    conditions.push(`status = $${params.length}`);
  }
  if (filter.schemeId !== undefined) {
    params.push(filter.schemeId);
    conditions.push(`scheme_id = $${params.length}`);
  }
  let sql = `SELECT ${APPLICATION_COLUMNS} FROM application`;
  if (conditions.length > 0) {
    sql += ` WHERE ${conditions.join(" AND ")}`;
  }
  params.push(filter.limit ?? 50, filter.offset ?? 0);
  sql += ` ORDER BY created_at DESC LIMIT $${params.length - 1} OFFSET $${params.length}`;

  const result = await query<ApplicationRow>(sql, params);
  return result.rows.map(rowToApplication);
}

// ── Status updates ──

export interface StatusChangeResult {
  status: ApplicationStatus;
  approvedAmount: number | null;
  entry: StatusChange;
}

/**
 * Validates a transition and computes the history entry to append.
 * Approving without an amount keeps an earlier approved amount, else the
 * applied amount.
 */
export function applyStatusChange(
  current: Pick<ApplicationRecord, "status" | "applied_amount" | "approved_amount">,
  input: UpdateApplicationStatusInput,
  changedBy: string,
  now: Date
): StatusChangeResult {
  if (!canTransitionStatus(current.status, input.status)) {
    throw new Error("INVALID_STATUS_TRANSITION");
  }
  let approvedAmount = input.approvedAmount ?? current.approved_amount;
  if (input.status === "APPROVED" && approvedAmount === null) {
    approvedAmount = current.applied_amount;
  }
  const entry: StatusChange = {
    status: input.status,
    timestamp: now.toISOString(),
    approvedAmount,
    ...(input.remarks ? { remarks: input.remarks } : {}),
    changedBy,
  };
  return { status: input.status, approvedAmount, entry };
}

/**
 * Moves an application through the status state machine under a row lock.
 * The history append and the column updates commit together or not at all.
 */
export async function updateApplicationStatus(
  applicationId: string,
  input: UpdateApplicationStatusInput,
  actorFarmerId: number,
  now: Date = new Date(),
  sink: NotificationSink = pgNotificationSink
): Promise<ApplicationRecord> {
  const client = await getClient();
  let updated: ApplicationRecord;
  try {
    await client.query("BEGIN");

    const locked = await client.query<ApplicationRow>(
      `SELECT ${APPLICATION_COLUMNS} FROM application WHERE application_id = $1 FOR UPDATE`,
      [applicationId]
    );
    if (locked.rows.length === 0) {
      throw new Error("APPLICATION_NOT_FOUND");
    }
    const current = rowToApplication(locked.rows[0]);
    const change = applyStatusChange(current, input, String(actorFarmerId), now);

    const result = await client.query<ApplicationRow>(
      `UPDATE application
          SET status = $2,
              approved_amount = $3,
              admin_remarks = COALESCE($4, admin_remarks),
              status_history = status_history || $5::jsonb,
              updated_at = NOW()
        WHERE application_id = $1
        RETURNING ${APPLICATION_COLUMNS}`,
      [applicationId, change.status, change.approvedAmount, input.remarks ?? null, JSON.stringify([change.entry])]
    );
    updated = rowToApplication(result.rows[0]);

    await client.query("COMMIT");
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }

  const schemeName = updated.application_data.schemeName;
  await notifyBestEffort(sink, {
    farmerId: updated.farmer_id,
    title: `Application Update: ${schemeName}`,
    message: `Your application ${updated.application_id} for ${schemeName} is now ${updated.status}.`,
    type: "status_update",
    schemeId: updated.scheme_id,
    applicationId: updated.application_id,
  });
  return updated;
}
