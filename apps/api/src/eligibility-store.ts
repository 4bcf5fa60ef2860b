/**
 * Storage boundary for the evaluator and the apply flows.
 *
 * `PgEligibilityStore` is the production implementation. Tests use an
 * in-memory store with the same two uniqueness rules on applications.
 */
import {
  ExtractedFieldSetSchema,
  isDocumentType,
  type FarmerFieldSets,
} from "@agroscheme/shared";
import { FARMER_COLUMNS, rowToFarmer, type Farmer, type FarmerRow } from "./auth";
import {
  APPLICATION_COLUMNS,
  rowToApplication,
  type ApplicationRecord,
  type ApplicationRow,
  type ApplicationWriter,
  type NewApplication,
} from "./applications";
import { toApplicationConflict } from "./application-errors";
import { query } from "./db";
import { logWarn } from "./logger";
import { pgNotificationSink, type NotificationInput, type NotificationSink } from "./notifications";
import { getScheme, type Scheme } from "./schemes";

export interface EligibilityStore extends ApplicationWriter, NotificationSink {
  getFarmer(farmerId: number): Promise<Farmer | null>;
  getScheme(schemeId: number): Promise<Scheme | null>;
  listAutoApplyFarmers(): Promise<Farmer[]>;
  /** Latest field set per document type; types with nothing on file are absent. */
  getLatestFieldSets(farmerId: number): Promise<FarmerFieldSets>;
  findApplication(farmerId: number, schemeId: number): Promise<ApplicationRecord | null>;
}

type FieldSetRow = {
  document_type: string;
  fields_jsonb: unknown;
};

export class PgEligibilityStore implements EligibilityStore {
  constructor(private readonly notifications: NotificationSink = pgNotificationSink) {}

  async getFarmer(farmerId: number): Promise<Farmer | null> {
    const result = await query<FarmerRow>(`SELECT ${FARMER_COLUMNS} FROM farmer WHERE id = $1`, [farmerId]);
    return result.rows.length > 0 ? rowToFarmer(result.rows[0]) : null;
  }

  async getScheme(schemeId: number): Promise<Scheme | null> {
    return getScheme(schemeId);
  }

  async listAutoApplyFarmers(): Promise<Farmer[]> {
    const result = await query<FarmerRow>(
      `SELECT ${FARMER_COLUMNS} FROM farmer WHERE auto_apply_enabled = true AND role = 'FARMER' ORDER BY id`
    );
    return result.rows.map(rowToFarmer);
  }

  async getLatestFieldSets(farmerId: number): Promise<FarmerFieldSets> {
    const result = await query<FieldSetRow>(
      "SELECT document_type, fields_jsonb FROM extracted_field_set WHERE farmer_id = $1",
      [farmerId]
    );
    const fieldSets: FarmerFieldSets = {};
    for (const row of result.rows) {
      const fields = ExtractedFieldSetSchema.safeParse(row.fields_jsonb);
      if (!isDocumentType(row.document_type) || !fields.success) {
        logWarn("Skipping unreadable field set", { farmerId, documentType: row.document_type });
        continue;
      }
      fieldSets[row.document_type] = fields.data;
    }
    return fieldSets;
  }

  async findApplication(farmerId: number, schemeId: number): Promise<ApplicationRecord | null> {
    const result = await query<ApplicationRow>(
      `SELECT ${APPLICATION_COLUMNS} FROM application WHERE farmer_id = $1 AND scheme_id = $2`,
      [farmerId, schemeId]
    );
    return result.rows.length > 0 ? rowToApplication(result.rows[0]) : null;
  }

  async insertApplication(application: NewApplication): Promise<ApplicationRecord> {
    try {
      const result = await query<ApplicationRow>(
        `INSERT INTO application
           (application_id, farmer_id, scheme_id, origin, status, applied_amount, application_data, status_history)
         VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb, $8::jsonb)
         RETURNING ${APPLICATION_COLUMNS}`,
        [
          application.applicationId,
          application.farmerId,
          application.schemeId,
          application.origin,
          application.status,
          application.appliedAmount,
          JSON.stringify(application.applicationData),
          JSON.stringify(application.statusHistory),
        ]
      );
      return rowToApplication(result.rows[0]);
    } catch (error: unknown) {
      throw toApplicationConflict(error);
    }
  }

  async createNotification(input: NotificationInput): Promise<void> {
    await this.notifications.createNotification(input);
  }
}
