/**
 * HTTP surface tests: real routing, auth middleware and schema validation,
 * with the service modules mocked. No database is needed.
 */
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import jwt from "jsonwebtoken";
import { buildApp } from "./app";
import * as auth from "./auth";
import * as schemes from "./schemes";
import * as autoApply from "./auto-apply";
import * as applications from "./applications";
import * as documents from "./documents";
import { generateToken } from "./middleware/auth";
import { makeFarmer, makeScheme } from "./eligibility.test-helpers";
import type { ApplicationRecord } from "./applications";
import type { FarmerDocument } from "./documents";

vi.mock("./db", () => ({
  query: vi.fn(async () => ({ rows: [], rowCount: 0 })),
  getClient: vi.fn(),
  uniqueViolationConstraint: vi.fn(() => null),
  pool: { totalCount: 0, idleCount: 0, waitingCount: 0 },
}));

vi.mock("./auth", () => ({
  registerFarmer: vi.fn(),
  authenticateFarmer: vi.fn(),
  getFarmerById: vi.fn(),
  updateAutoApplyPreference: vi.fn(),
  updateFarmerProfile: vi.fn(),
}));

vi.mock("./schemes", () => ({
  createScheme: vi.fn(),
  getScheme: vi.fn(),
  listSchemes: vi.fn(),
  deactivateScheme: vi.fn(),
}));

vi.mock("./auto-apply", () => ({
  createDefaultEligibilityContext: vi.fn(() => ({})),
  checkSchemeEligibility: vi.fn(),
  manualApplyForScheme: vi.fn(),
  autoApplyForScheme: vi.fn(),
  scheduleAutoApply: vi.fn(),
}));

vi.mock("./applications", () => ({
  listFarmerApplications: vi.fn(),
  listApplications: vi.fn(async () => []),
  getApplicationById: vi.fn(),
  updateApplicationStatus: vi.fn(),
}));

vi.mock("./notifications", () => ({
  getFarmerNotifications: vi.fn(async () => []),
  markNotificationRead: vi.fn(),
}));

vi.mock("./documents", () => ({
  uploadFarmerDocument: vi.fn(),
  previewExtraction: vi.fn(),
  listFarmerDocuments: vi.fn(async () => []),
  listFieldSets: vi.fn(async () => []),
  listPendingDocuments: vi.fn(async () => []),
  verifyDocument: vi.fn(),
}));

const farmer = makeFarmer(12);
const admin = makeFarmer(1, { role: "ADMIN" });
const farmerToken = generateToken(farmer);
const adminToken = generateToken(admin);

const verdict = {
  eligible: false,
  criteriaMet: false,
  matchPercentage: 50,
  matchedCriteria: ["age_min"],
  missingCriteria: ["annual_income_max"],
  unverifiedCriteria: [],
  reasons: ["Annual income 200000 exceeds the limit of 100000"],
  hasRequiredDocuments: true,
  missingDocuments: [],
};

function applicationFor(farmerId: number): ApplicationRecord {
  return {
    id: 1,
    application_id: "APP20260301000001",
    farmer_id: farmerId,
    scheme_id: 7,
    origin: "MANUAL",
    status: "PENDING",
    applied_amount: 6000,
    approved_amount: null,
    admin_remarks: null,
    application_data: {
      schemeName: "Scheme 7",
      schemeCode: "SCHEME-7",
      origin: "MANUAL",
      appliedAt: "2026-03-01T09:00:00.000Z",
      eligibility: { ...verdict, eligible: true, criteriaMet: true, matchPercentage: 100, missingCriteria: [], reasons: [] },
    },
    status_history: [{ status: "PENDING", timestamp: "2026-03-01T09:00:00.000Z", approvedAmount: null }],
    created_at: new Date("2026-03-01T09:00:00.000Z"),
    updated_at: new Date("2026-03-01T09:00:00.000Z"),
  };
}

const DOCUMENT_ID = "0f8fad5b-d9cb-469f-a165-70867728950e";

function reviewedDocument(overrides: Partial<FarmerDocument> = {}): FarmerDocument {
  return {
    document_id: DOCUMENT_ID,
    farmer_id: 12,
    document_type: "land_record",
    storage_key: `farmers/12/land_record/${DOCUMENT_ID}-7-12.pdf`,
    original_filename: "7-12.pdf",
    mime_type: "application/pdf",
    size_bytes: 2048,
    checksum: "abc123",
    confidence: 50,
    uploaded_at: new Date("2026-03-01T09:00:00.000Z"),
    verification_status: "VERIFIED",
    verification_remarks: null,
    verified_by: 1,
    verified_at: new Date("2026-03-02T10:00:00.000Z"),
    ...overrides,
  };
}

describe("AgroScheme API", () => {
  let app: Awaited<ReturnType<typeof buildApp>>;

  beforeAll(async () => {
    app = await buildApp(false);
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    vi.clearAllMocks();
  });

  const asFarmer = { authorization: `Bearer ${farmerToken}` };
  const asAdmin = { authorization: `Bearer ${adminToken}` };

  it("serves health without authentication", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.payload)).toEqual({ status: "ok" });
  });

  it("rejects requests without a token", async () => {
    const res = await app.inject({ method: "GET", url: "/api/v1/schemes" });
    expect(res.statusCode).toBe(401);
    expect(JSON.parse(res.payload).error).toBe("AUTHENTICATION_REQUIRED");
  });

  it("rejects a token signed with another secret", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/api/v1/schemes",
      headers: { authorization: "Bearer not.a.token" },
    });
    expect(res.statusCode).toBe(401);
    expect(JSON.parse(res.payload).error).toBe("INVALID_TOKEN");
  });

  it("rejects a token whose farmer code is malformed", async () => {
    const token = jwt.sign(
      { farmerId: 12, farmerCode: "FARMER-12", role: "FARMER", jti: "jti-x" },
      process.env.JWT_SECRET ?? "test-secret"
    );

    const res = await app.inject({ method: "GET", url: "/api/v1/schemes", headers: { authorization: `Bearer ${token}` } });

    expect(res.statusCode).toBe(401);
    expect(JSON.parse(res.payload).error).toBe("INVALID_TOKEN");
  });

  describe("auth", () => {
    const registration = {
      fullName: "Ramesh Patil",
      mobileNumber: "98765 43210",
      password: "test-password",
      state: "Maharashtra",
      district: "Pune",
    };

    it("registers a farmer and returns a token", async () => {
      vi.mocked(auth.registerFarmer).mockResolvedValue(farmer);

      const res = await app.inject({ method: "POST", url: "/api/v1/auth/register", payload: registration });

      expect(res.statusCode).toBe(201);
      expect(typeof JSON.parse(res.payload).token).toBe("string");
      expect(auth.registerFarmer).toHaveBeenCalledWith({
        fullName: "Ramesh Patil",
        mobileNumber: "9876543210",
        password: "test-password",
        state: "Maharashtra",
        district: "Pune",
        language: "en",
        autoApplyEnabled: true,
      });
    });

    it("rejects unknown body fields", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/api/v1/auth/register",
        payload: { ...registration, role: "ADMIN" },
      });
      expect(res.statusCode).toBe(400);
      expect(JSON.parse(res.payload).error).toBe("INVALID_REQUEST_BODY");
      expect(auth.registerFarmer).not.toHaveBeenCalled();
    });

    it("reports a duplicate mobile number as a conflict", async () => {
      vi.mocked(auth.registerFarmer).mockRejectedValue(new Error("MOBILE_ALREADY_REGISTERED"));

      const res = await app.inject({ method: "POST", url: "/api/v1/auth/register", payload: registration });

      expect(res.statusCode).toBe(409);
      expect(JSON.parse(res.payload).error).toBe("MOBILE_ALREADY_REGISTERED");
    });

    it("rejects wrong credentials", async () => {
      vi.mocked(auth.authenticateFarmer).mockResolvedValue(null);

      const res = await app.inject({
        method: "POST",
        url: "/api/v1/auth/login",
        payload: { mobileNumber: "9876543210", password: "wrong-password" },
      });

      expect(res.statusCode).toBe(401);
      expect(JSON.parse(res.payload).error).toBe("INVALID_CREDENTIALS");
    });
  });

  describe("schemes", () => {
    it("validates the scheme id", async () => {
      const res = await app.inject({ method: "GET", url: "/api/v1/schemes/abc", headers: asFarmer });
      expect(res.statusCode).toBe(400);
      expect(JSON.parse(res.payload).error).toBe("INVALID_PATH_PARAMS");
    });

    it("passes list paging defaults to the service", async () => {
      vi.mocked(schemes.listSchemes).mockResolvedValue([]);

      const res = await app.inject({ method: "GET", url: "/api/v1/schemes?search=kisan", headers: asFarmer });

      expect(res.statusCode).toBe(200);
      expect(schemes.listSchemes).toHaveBeenCalledWith({ search: "kisan", limit: 20, offset: 0 });
    });

    it("returns 404 from the eligibility check of an unknown scheme", async () => {
      vi.mocked(autoApply.checkSchemeEligibility).mockResolvedValue({
        status: "SCHEME_NOT_FOUND",
        verdict: { ...verdict, reasons: ["Scheme not found"] },
      });

      const res = await app.inject({ method: "GET", url: "/api/v1/schemes/99/eligibility", headers: asFarmer });

      expect(res.statusCode).toBe(404);
      expect(JSON.parse(res.payload)).toEqual({
        error: "SCHEME_NOT_FOUND",
        message: "Scheme not found",
        statusCode: 404,
      });
    });

    it("creates a manual application", async () => {
      vi.mocked(autoApply.manualApplyForScheme).mockResolvedValue({
        outcome: "APPLIED",
        application: applicationFor(12),
        verdict,
      });

      const res = await app.inject({
        method: "POST",
        url: "/api/v1/schemes/7/apply",
        headers: asFarmer,
        payload: {},
      });

      expect(res.statusCode).toBe(201);
      expect(JSON.parse(res.payload).application.application_id).toBe("APP20260301000001");
      expect(autoApply.manualApplyForScheme).toHaveBeenCalledWith({}, 12, 7);
    });

    it("reports an existing application with its id", async () => {
      vi.mocked(autoApply.manualApplyForScheme).mockResolvedValue({
        outcome: "ALREADY_APPLIED",
        applicationId: "APP20260301000001",
      });

      const res = await app.inject({ method: "POST", url: "/api/v1/schemes/7/apply", headers: asFarmer, payload: {} });

      expect(res.statusCode).toBe(409);
      expect(JSON.parse(res.payload)).toMatchObject({ error: "ALREADY_APPLIED", applicationId: "APP20260301000001" });
    });

    it("declines an ineligible farmer with the verdict", async () => {
      vi.mocked(autoApply.manualApplyForScheme).mockResolvedValue({ outcome: "INELIGIBLE", verdict });

      const res = await app.inject({ method: "POST", url: "/api/v1/schemes/7/apply", headers: asFarmer, payload: {} });

      expect(res.statusCode).toBe(400);
      expect(JSON.parse(res.payload).verdict.missingCriteria).toEqual(["annual_income_max"]);
    });
  });

  describe("applications", () => {
    it("hides another farmer's application", async () => {
      vi.mocked(applications.getApplicationById).mockResolvedValue(applicationFor(13));

      const res = await app.inject({
        method: "GET",
        url: "/api/v1/applications/APP20260301000001",
        headers: asFarmer,
      });

      expect(res.statusCode).toBe(403);
    });

    it("lets an admin read any application", async () => {
      vi.mocked(applications.getApplicationById).mockResolvedValue(applicationFor(13));

      const res = await app.inject({
        method: "GET",
        url: "/api/v1/applications/APP20260301000001",
        headers: asAdmin,
      });

      expect(res.statusCode).toBe(200);
    });
  });

  describe("admin", () => {
    const newScheme = {
      schemeName: "Drip Irrigation Subsidy",
      schemeCode: "DRIP-2026",
      benefitAmount: 25000,
      eligibilityCriteria: { land_holding_min: 1 },
      requiredDocuments: ["Land Record"],
    };

    it("is closed to farmers", async () => {
      const res = await app.inject({ method: "POST", url: "/api/v1/admin/schemes", headers: asFarmer, payload: newScheme });
      expect(res.statusCode).toBe(403);
      expect(schemes.createScheme).not.toHaveBeenCalled();
    });

    it("creates a scheme and schedules auto-apply", async () => {
      vi.mocked(schemes.createScheme).mockResolvedValue(makeScheme(21, { scheme_code: "DRIP-2026" }));

      const res = await app.inject({ method: "POST", url: "/api/v1/admin/schemes", headers: asAdmin, payload: newScheme });

      expect(res.statusCode).toBe(201);
      expect(JSON.parse(res.payload).autoApplyScheduled).toBe(true);
      expect(autoApply.scheduleAutoApply).toHaveBeenCalledWith(21);
    });

    it("rejects criteria keys the evaluator does not know", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/api/v1/admin/schemes",
        headers: asAdmin,
        payload: { ...newScheme, eligibilityCriteria: { state: "Maharashtra" } },
      });
      expect(res.statusCode).toBe(400);
    });

    it("maps an invalid status transition to 409", async () => {
      vi.mocked(applications.updateApplicationStatus).mockRejectedValue(new Error("INVALID_STATUS_TRANSITION"));

      const res = await app.inject({
        method: "PUT",
        url: "/api/v1/admin/applications/APP20260301000001/status",
        headers: asAdmin,
        payload: { status: "PENDING" },
      });

      expect(res.statusCode).toBe(409);
      expect(JSON.parse(res.payload).error).toBe("INVALID_STATUS_TRANSITION");
    });

    it("passes the admin id to the status update", async () => {
      vi.mocked(applications.updateApplicationStatus).mockResolvedValue({
        ...applicationFor(12),
        status: "APPROVED",
        approved_amount: 6000,
      });

      const res = await app.inject({
        method: "PUT",
        url: "/api/v1/admin/applications/APP20260301000001/status",
        headers: asAdmin,
        payload: { status: "APPROVED", remarks: "Verified" },
      });

      expect(res.statusCode).toBe(200);
      expect(applications.updateApplicationStatus).toHaveBeenCalledWith(
        "APP20260301000001",
        { status: "APPROVED", remarks: "Verified" },
        1
      );
    });
  });

  describe("admin schemes", () => {
    it("deactivates a scheme", async () => {
      vi.mocked(schemes.deactivateScheme).mockResolvedValue(makeScheme(7, { is_active: false }));

      const res = await app.inject({ method: "DELETE", url: "/api/v1/admin/schemes/7", headers: asAdmin, payload: {} });

      expect(res.statusCode).toBe(200);
      expect(JSON.parse(res.payload).scheme.is_active).toBe(false);
      expect(schemes.deactivateScheme).toHaveBeenCalledWith(7);
    });

    it("returns 404 when deactivating an unknown scheme", async () => {
      vi.mocked(schemes.deactivateScheme).mockResolvedValue(null);

      const res = await app.inject({ method: "DELETE", url: "/api/v1/admin/schemes/99", headers: asAdmin, payload: {} });

      expect(res.statusCode).toBe(404);
      expect(JSON.parse(res.payload).error).toBe("SCHEME_NOT_FOUND");
    });

    it("does not let a farmer deactivate a scheme", async () => {
      const res = await app.inject({ method: "DELETE", url: "/api/v1/admin/schemes/7", headers: asFarmer, payload: {} });

      expect(res.statusCode).toBe(403);
      expect(schemes.deactivateScheme).not.toHaveBeenCalled();
    });
  });

  describe("admin applications", () => {
    it("lists applications across farmers with filters", async () => {
      vi.mocked(applications.listApplications).mockResolvedValue([applicationFor(12), applicationFor(13)]);

      const res = await app.inject({
        method: "GET",
        url: "/api/v1/admin/applications?status=PENDING&schemeId=7",
        headers: asAdmin,
      });

      expect(res.statusCode).toBe(200);
      expect(JSON.parse(res.payload).applications).toHaveLength(2);
      expect(applications.listApplications).toHaveBeenCalledWith({ status: "PENDING", schemeId: 7, limit: 50, offset: 0 });
    });

    it("keeps the review queue from farmers", async () => {
      const res = await app.inject({ method: "GET", url: "/api/v1/admin/applications", headers: asFarmer });

      expect(res.statusCode).toBe(403);
      expect(applications.listApplications).not.toHaveBeenCalled();
    });

    it("returns an application with its applicant", async () => {
      vi.mocked(applications.getApplicationById).mockResolvedValue(applicationFor(13));
      vi.mocked(auth.getFarmerById).mockResolvedValue(makeFarmer(13));

      const res = await app.inject({
        method: "GET",
        url: "/api/v1/admin/applications/APP20260301000001",
        headers: asAdmin,
      });

      expect(res.statusCode).toBe(200);
      const body = JSON.parse(res.payload);
      expect(body.application.farmer_id).toBe(13);
      expect(body.farmer.farmer_code).toBe("AGRO00000013");
      expect(auth.getFarmerById).toHaveBeenCalledWith(13);
    });

    it("returns 404 for an unknown application", async () => {
      vi.mocked(applications.getApplicationById).mockResolvedValue(null);

      const res = await app.inject({
        method: "GET",
        url: "/api/v1/admin/applications/APP20260301FFFFFF",
        headers: asAdmin,
      });

      expect(res.statusCode).toBe(404);
      expect(JSON.parse(res.payload).error).toBe("APPLICATION_NOT_FOUND");
    });

    it("rejects an approved amount beyond the stored precision", async () => {
      const res = await app.inject({
        method: "PUT",
        url: "/api/v1/admin/applications/APP20260301000001/status",
        headers: asAdmin,
        payload: { status: "APPROVED", approvedAmount: 1_000_000_000_000 },
      });

      expect(res.statusCode).toBe(400);
      expect(JSON.parse(res.payload).error).toBe("INVALID_REQUEST_BODY");
      expect(applications.updateApplicationStatus).not.toHaveBeenCalled();
    });

    it("accepts the largest storable approved amount", async () => {
      vi.mocked(applications.updateApplicationStatus).mockResolvedValue({
        ...applicationFor(12),
        status: "APPROVED",
        approved_amount: 999_999_999_999.99,
      });

      const res = await app.inject({
        method: "PUT",
        url: "/api/v1/admin/applications/APP20260301000001/status",
        headers: asAdmin,
        payload: { status: "APPROVED", approvedAmount: 999_999_999_999.99 },
      });

      expect(res.statusCode).toBe(200);
      expect(applications.updateApplicationStatus).toHaveBeenCalledWith(
        "APP20260301000001",
        { status: "APPROVED", approvedAmount: 999_999_999_999.99 },
        1
      );
    });
  });

  describe("admin document review", () => {
    it("lists pending documents of one type", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/api/v1/admin/documents/pending?documentType=land_record&limit=10",
        headers: asAdmin,
      });

      expect(res.statusCode).toBe(200);
      expect(JSON.parse(res.payload)).toEqual({ documents: [], limit: 10, offset: 0 });
      expect(documents.listPendingDocuments).toHaveBeenCalledWith({ documentType: "land_record", limit: 10, offset: 0 });
    });

    it("records a rejection with remarks", async () => {
      vi.mocked(documents.verifyDocument).mockResolvedValue(
        reviewedDocument({ verification_status: "REJECTED", verification_remarks: "Blurred scan" })
      );

      const res = await app.inject({
        method: "PUT",
        url: `/api/v1/admin/documents/${DOCUMENT_ID}/verify`,
        headers: asAdmin,
        payload: { status: "REJECTED", remarks: "Blurred scan" },
      });

      expect(res.statusCode).toBe(200);
      expect(JSON.parse(res.payload).document.verification_status).toBe("REJECTED");
      expect(documents.verifyDocument).toHaveBeenCalledWith(DOCUMENT_ID, { status: "REJECTED", remarks: "Blurred scan" }, 1);
    });

    it("requires remarks for a rejection", async () => {
      const res = await app.inject({
        method: "PUT",
        url: `/api/v1/admin/documents/${DOCUMENT_ID}/verify`,
        headers: asAdmin,
        payload: { status: "REJECTED" },
      });

      expect(res.statusCode).toBe(400);
      expect(JSON.parse(res.payload).error).toBe("INVALID_REQUEST_BODY");
      expect(documents.verifyDocument).not.toHaveBeenCalled();
    });

    it("returns 404 for an unknown document", async () => {
      vi.mocked(documents.verifyDocument).mockResolvedValue(null);

      const res = await app.inject({
        method: "PUT",
        url: `/api/v1/admin/documents/${DOCUMENT_ID}/verify`,
        headers: asAdmin,
        payload: { status: "VERIFIED" },
      });

      expect(res.statusCode).toBe(404);
      expect(JSON.parse(res.payload).error).toBe("DOCUMENT_NOT_FOUND");
    });

    it("validates the document id", async () => {
      const res = await app.inject({
        method: "PUT",
        url: "/api/v1/admin/documents/not-a-uuid/verify",
        headers: asAdmin,
        payload: { status: "VERIFIED" },
      });

      expect(res.statusCode).toBe(400);
      expect(JSON.parse(res.payload).error).toBe("INVALID_PATH_PARAMS");
    });

    it("keeps document review from farmers", async () => {
      const res = await app.inject({
        method: "PUT",
        url: `/api/v1/admin/documents/${DOCUMENT_ID}/verify`,
        headers: asFarmer,
        payload: { status: "VERIFIED" },
      });

      expect(res.statusCode).toBe(403);
      expect(documents.verifyDocument).not.toHaveBeenCalled();
    });
  });

  describe("profile", () => {
    it("updates the caller's own profile", async () => {
      vi.mocked(auth.updateFarmerProfile).mockResolvedValue({ ...farmer, district: "Nashik" });

      const res = await app.inject({
        method: "PUT",
        url: "/api/v1/profile/me",
        headers: asFarmer,
        payload: { district: "Nashik", village: null },
      });

      expect(res.statusCode).toBe(200);
      expect(JSON.parse(res.payload).farmer.district).toBe("Nashik");
      expect(auth.updateFarmerProfile).toHaveBeenCalledWith(12, { district: "Nashik", village: null });
    });

    it("rejects an empty profile update", async () => {
      const res = await app.inject({ method: "PUT", url: "/api/v1/profile/me", headers: asFarmer, payload: {} });

      expect(res.statusCode).toBe(400);
      expect(JSON.parse(res.payload).error).toBe("INVALID_REQUEST_BODY");
      expect(auth.updateFarmerProfile).not.toHaveBeenCalled();
    });

    it("does not let a farmer change their mobile number", async () => {
      const res = await app.inject({
        method: "PUT",
        url: "/api/v1/profile/me",
        headers: asFarmer,
        payload: { mobileNumber: "9123456789" },
      });

      expect(res.statusCode).toBe(400);
      expect(auth.updateFarmerProfile).not.toHaveBeenCalled();
    });
  });

  describe("documents", () => {
    it("previews extraction of supplied text", async () => {
      vi.mocked(documents.previewExtraction).mockReturnValue({
        documentType: "income_certificate",
        fields: { annual_income: 120000 },
        confidence: 50,
        unparsedFields: [],
      });

      const res = await app.inject({
        method: "POST",
        url: "/api/v1/documents/extract",
        headers: asFarmer,
        payload: { documentType: "income_certificate", text: "Annual Income: Rs. 1,20,000" },
      });

      expect(res.statusCode).toBe(200);
      expect(documents.previewExtraction).toHaveBeenCalledWith("income_certificate", "Annual Income: Rs. 1,20,000");
    });

    it("rejects an unknown document type", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/api/v1/documents/extract",
        headers: asFarmer,
        payload: { documentType: "ration_card", text: "x" },
      });
      expect(res.statusCode).toBe(400);
      expect(JSON.parse(res.payload).error).toBe("INVALID_REQUEST_BODY");
    });
  });
});
