import type { FastifyInstance } from "fastify";
import {
  CreateSchemeInputSchema,
  DOCUMENT_TYPES,
  MAX_APPROVED_AMOUNT,
  UpdateApplicationStatusInputSchema,
  VerifyDocumentInputSchema,
  type ApplicationStatus,
  type DocumentType,
} from "@agroscheme/shared";
import * as schemes from "../schemes";
import { getApplicationById, listApplications, updateApplicationStatus } from "../applications";
import { getFarmerById } from "../auth";
import { listPendingDocuments, verifyDocument } from "../documents";
import { autoApplyForScheme, createDefaultEligibilityContext, scheduleAutoApply } from "../auto-apply";
import { send400, send404, send409 } from "../errors";
import { requireAdmin } from "../route-access";
import { applicationIdParamsSchema } from "./application.routes";

const criteriaSchema = {
  type: "object",
  additionalProperties: false,
  properties: {
    age_min: { type: "integer", minimum: 0 },
    age_max: { type: "integer", minimum: 0 },
    annual_income_max: { type: "number", minimum: 0 },
    land_holding_min: { type: "number", minimum: 0 },
    caste_allowed: { type: "array", minItems: 1, items: { type: "string", minLength: 1 } },
    gender: { type: "string", minLength: 1 },
  },
};

const createSchemeSchema = {
  body: {
    type: "object",
    required: ["schemeName", "schemeCode"],
    additionalProperties: false,
    properties: {
      schemeName: { type: "string", minLength: 1, maxLength: 200 },
      schemeCode: { type: "string", minLength: 2, maxLength: 40 },
      description: { type: "string", maxLength: 5000 },
      schemeType: { type: "string", maxLength: 100 },
      department: { type: "string", maxLength: 200 },
      benefitAmount: { type: ["number", "null"], minimum: 0 },
      lastDate: { type: "string", format: "date" },
      isActive: { type: "boolean" },
      eligibilityCriteria: criteriaSchema,
      requiredDocuments: { type: "array", maxItems: 20, items: { type: "string", minLength: 1, maxLength: 200 } },
    },
  },
};

const schemeIdParamsSchema = {
  type: "object",
  required: ["schemeId"],
  additionalProperties: false,
  properties: {
    schemeId: { type: "integer", minimum: 1 },
  },
};

const runAutoApplySchema = {
  params: schemeIdParamsSchema,
  body: {
    type: "object",
    additionalProperties: false,
    properties: {},
  },
};

const deactivateSchemeSchema = {
  params: schemeIdParamsSchema,
  body: {
    type: "object",
    additionalProperties: false,
    properties: {},
  },
};

const listAllApplicationsSchema = {
  querystring: {
    type: "object",
    additionalProperties: false,
    properties: {
      status: { type: "string", enum: ["PENDING", "UNDER_REVIEW", "APPROVED", "REJECTED", "DOCS_NEEDED"] },
      schemeId: { type: "integer", minimum: 1 },
      limit: { type: "integer", minimum: 1, maximum: 100, default: 50 },
      offset: { type: "integer", minimum: 0, default: 0 },
    },
  },
};

const pendingDocumentsSchema = {
  querystring: {
    type: "object",
    additionalProperties: false,
    properties: {
      documentType: { type: "string", enum: [...DOCUMENT_TYPES] },
      limit: { type: "integer", minimum: 1, maximum: 100, default: 50 },
      offset: { type: "integer", minimum: 0, default: 0 },
    },
  },
};

const verifyDocumentSchema = {
  params: {
    type: "object",
    required: ["documentId"],
    additionalProperties: false,
    properties: {
      documentId: { type: "string", format: "uuid" },
    },
  },
  body: {
    type: "object",
    required: ["status"],
    additionalProperties: false,
    properties: {
      status: { type: "string", enum: ["VERIFIED", "REJECTED"] },
      remarks: { type: "string", maxLength: 2000 },
    },
  },
};

const updateStatusSchema = {
  params: applicationIdParamsSchema,
  body: {
    type: "object",
    required: ["status"],
    additionalProperties: false,
    properties: {
      status: { type: "string", enum: ["PENDING", "UNDER_REVIEW", "APPROVED", "REJECTED", "DOCS_NEEDED"] },
      approvedAmount: { type: "number", minimum: 0, maximum: MAX_APPROVED_AMOUNT },
      remarks: { type: "string", maxLength: 2000 },
    },
  },
};

export async function registerAdminRoutes(app: FastifyInstance) {
  app.post("/api/v1/admin/schemes", { schema: createSchemeSchema }, async (request, reply) => {
    if (requireAdmin(request, reply) === null) return;

    const parsed = CreateSchemeInputSchema.safeParse(request.body);
    if (!parsed.success) {
      return send400(reply, "INVALID_REQUEST_BODY", parsed.error.issues[0]?.message);
    }

    let scheme: schemes.Scheme;
    try {
      scheme = await schemes.createScheme(parsed.data);
    } catch (error: unknown) {
      if (error instanceof Error && error.message === "SCHEME_CODE_EXISTS") {
        return send409(reply, "SCHEME_CODE_EXISTS", "A scheme with this code already exists");
      }
      throw error;
    }

    // The sweep runs after this response; its outcome is only logged.
    if (scheme.is_active) {
      scheduleAutoApply(scheme.id);
    }
    reply.code(201);
    return { scheme, autoApplyScheduled: scheme.is_active };
  });

  app.post<{ Params: { schemeId: number } }>(
    "/api/v1/admin/schemes/:schemeId/auto-apply",
    { schema: runAutoApplySchema },
    async (request, reply) => {
      if (requireAdmin(request, reply) === null) return;

      const scheme = await schemes.getScheme(request.params.schemeId);
      if (!scheme) return send404(reply, "SCHEME_NOT_FOUND");

      const summary = await autoApplyForScheme(createDefaultEligibilityContext(), scheme.id);
      return {
        schemeId: summary.schemeId,
        evaluated: summary.evaluated,
        created: summary.created.map((application) => application.application_id),
        alreadyApplied: summary.alreadyApplied,
        ineligible: summary.ineligible,
        failed: summary.failed,
      };
    }
  );

  app.delete<{ Params: { schemeId: number } }>(
    "/api/v1/admin/schemes/:schemeId",
    { schema: deactivateSchemeSchema },
    async (request, reply) => {
      if (requireAdmin(request, reply) === null) return;

      const scheme = await schemes.deactivateScheme(request.params.schemeId);
      if (!scheme) return send404(reply, "SCHEME_NOT_FOUND");
      return { scheme };
    }
  );

  app.get<{
    Querystring: { status?: ApplicationStatus; schemeId?: number; limit: number; offset: number };
  }>("/api/v1/admin/applications", { schema: listAllApplicationsSchema }, async (request, reply) => {
    if (requireAdmin(request, reply) === null) return;

    const { status, schemeId, limit, offset } = request.query;
    const items = await listApplications({ status, schemeId, limit, offset });
    return { applications: items, limit, offset };
  });

  app.get<{ Params: { applicationId: string } }>(
    "/api/v1/admin/applications/:applicationId",
    { schema: { params: applicationIdParamsSchema } },
    async (request, reply) => {
      if (requireAdmin(request, reply) === null) return;

      const application = await getApplicationById(request.params.applicationId);
      if (!application) return send404(reply, "APPLICATION_NOT_FOUND");
      const farmer = await getFarmerById(application.farmer_id);
      return { application, farmer };
    }
  );

  app.get<{ Querystring: { documentType?: DocumentType; limit: number; offset: number } }>(
    "/api/v1/admin/documents/pending",
    { schema: pendingDocumentsSchema },
    async (request, reply) => {
      if (requireAdmin(request, reply) === null) return;

      const { documentType, limit, offset } = request.query;
      const documents = await listPendingDocuments({ documentType, limit, offset });
      return { documents, limit, offset };
    }
  );

  app.put<{ Params: { documentId: string } }>(
    "/api/v1/admin/documents/:documentId/verify",
    { schema: verifyDocumentSchema },
    async (request, reply) => {
      const adminId = requireAdmin(request, reply);
      if (adminId === null) return;

      const parsed = VerifyDocumentInputSchema.safeParse(request.body);
      if (!parsed.success) {
        return send400(reply, "INVALID_REQUEST_BODY", parsed.error.issues[0]?.message);
      }

      const document = await verifyDocument(request.params.documentId, parsed.data, adminId);
      if (!document) return send404(reply, "DOCUMENT_NOT_FOUND");
      return { document };
    }
  );

  app.put<{ Params: { applicationId: string } }>(
    "/api/v1/admin/applications/:applicationId/status",
    { schema: updateStatusSchema },
    async (request, reply) => {
      const adminId = requireAdmin(request, reply);
      if (adminId === null) return;

      const parsed = UpdateApplicationStatusInputSchema.safeParse(request.body);
      if (!parsed.success) {
        return send400(reply, "INVALID_REQUEST_BODY", parsed.error.issues[0]?.message);
      }

      try {
        const application = await updateApplicationStatus(request.params.applicationId, parsed.data, adminId);
        return { application };
      } catch (error: unknown) {
        if (error instanceof Error && error.message === "APPLICATION_NOT_FOUND") {
          return send404(reply, "APPLICATION_NOT_FOUND");
        }
        if (error instanceof Error && error.message === "INVALID_STATUS_TRANSITION") {
          return send409(reply, "INVALID_STATUS_TRANSITION", "This status change is not allowed from the current status");
        }
        throw error;
      }
    }
  );
}
