import type { FarmerFieldSets } from "@agroscheme/shared";
import type { Farmer } from "./auth";
import type { ApplicationRecord, NewApplication } from "./applications";
import { ApplicationConflictError } from "./application-errors";
import type { EligibilityStore } from "./eligibility-store";
import type { NotificationInput } from "./notifications";
import type { Scheme } from "./schemes";

export function makeFarmer(id: number, overrides: Partial<Farmer> = {}): Farmer {
  return {
    id,
    farmer_code: `AGRO${String(id).padStart(8, "0")}`,
    full_name: `Farmer ${id}`,
    mobile_number: `98765${String(id).padStart(5, "0")}`,
    email: null,
    state: "Maharashtra",
    district: "Pune",
    village: null,
    language: "en",
    role: "FARMER",
    auto_apply_enabled: true,
    created_at: new Date("2026-01-01T00:00:00.000Z"),
    ...overrides,
  };
}

export function makeScheme(id: number, overrides: Partial<Scheme> = {}): Scheme {
  return {
    id,
    scheme_code: `SCHEME-${id}`,
    scheme_name: `Scheme ${id}`,
    description: null,
    scheme_type: null,
    department: null,
    benefit_amount: 6000,
    last_date: null,
    is_active: true,
    eligibility_criteria: {},
    required_documents: [],
    created_at: new Date("2026-01-01T00:00:00.000Z"),
    ...overrides,
  };
}

/**
 * In-process store enforcing the same uniqueness rules as the
 * `application` table: unique application id, unique (farmer, scheme).
 */
export class InMemoryEligibilityStore implements EligibilityStore {
  readonly farmers = new Map<number, Farmer>();
  readonly schemes = new Map<number, Scheme>();
  readonly fieldSets = new Map<number, FarmerFieldSets>();
  readonly applications: ApplicationRecord[] = [];
  readonly notifications: NotificationInput[] = [];

  /** Farmers whose field-set read throws. */
  readonly brokenFarmers = new Set<number>();
  failNotifications = false;
  /** Application ids that already exist in some other row. */
  readonly takenApplicationIds = new Set<string>();

  private nextId = 1;

  addFarmer(farmer: Farmer, fieldSets: FarmerFieldSets = {}): this {
    this.farmers.set(farmer.id, farmer);
    this.fieldSets.set(farmer.id, fieldSets);
    return this;
  }

  addScheme(scheme: Scheme): this {
    this.schemes.set(scheme.id, scheme);
    return this;
  }

  async getFarmer(farmerId: number): Promise<Farmer | null> {
    return this.farmers.get(farmerId) ?? null;
  }

  async getScheme(schemeId: number): Promise<Scheme | null> {
    return this.schemes.get(schemeId) ?? null;
  }

  async listAutoApplyFarmers(): Promise<Farmer[]> {
    return [...this.farmers.values()].filter((farmer) => farmer.auto_apply_enabled);
  }

  async getLatestFieldSets(farmerId: number): Promise<FarmerFieldSets> {
    if (this.brokenFarmers.has(farmerId)) {
      throw new Error("FIELD_SET_READ_FAILED");
    }
    return this.fieldSets.get(farmerId) ?? {};
  }

  async findApplication(farmerId: number, schemeId: number): Promise<ApplicationRecord | null> {
    return this.applications.find((app) => app.farmer_id === farmerId && app.scheme_id === schemeId) ?? null;
  }

  async insertApplication(application: NewApplication): Promise<ApplicationRecord> {
    // Yield so concurrent callers interleave the way they would against a database.
    await Promise.resolve();
    if (
      this.takenApplicationIds.has(application.applicationId) ||
      this.applications.some((app) => app.application_id === application.applicationId)
    ) {
      throw new ApplicationConflictError("APPLICATION_ID");
    }
    if (
      this.applications.some(
        (app) => app.farmer_id === application.farmerId && app.scheme_id === application.schemeId
      )
    ) {
      throw new ApplicationConflictError("FARMER_SCHEME");
    }
    const now = new Date(application.applicationData.appliedAt);
    const record: ApplicationRecord = {
      id: this.nextId++,
      application_id: application.applicationId,
      farmer_id: application.farmerId,
      scheme_id: application.schemeId,
      origin: application.origin,
      status: application.status,
      applied_amount: application.appliedAmount,
      approved_amount: null,
      admin_remarks: null,
      application_data: application.applicationData,
      status_history: application.statusHistory,
      created_at: now,
      updated_at: now,
    };
    this.applications.push(record);
    return record;
  }

  async createNotification(input: NotificationInput): Promise<void> {
    if (this.failNotifications) {
      throw new Error("NOTIFICATION_STORE_DOWN");
    }
    this.notifications.push(input);
  }
}

/** Deterministic identifiers: APP20260301000001, APP20260301000002, ... */
export function sequentialApplicationIds(): (now: Date) => string {
  let counter = 0;
  return (now) => {
    counter++;
    const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
    return `APP${datePart}${counter.toString(16).toUpperCase().padStart(6, "0")}`;
  };
}
