import type { FastifyInstance } from "fastify";
import * as schemes from "../schemes";
import { createDefaultEligibilityContext, checkSchemeEligibility, manualApplyForScheme } from "../auto-apply";
import { send400, send404, send409 } from "../errors";
import { requireFarmerId } from "../route-access";

const schemeIdParamsSchema = {
  type: "object",
  required: ["schemeId"],
  additionalProperties: false,
  properties: {
    schemeId: { type: "integer", minimum: 1 },
  },
};

type SchemeParams = { Params: { schemeId: number } };

const listSchemesSchema = {
  querystring: {
    type: "object",
    additionalProperties: false,
    properties: {
      search: { type: "string", maxLength: 100 },
      limit: { type: "integer", minimum: 1, maximum: 100, default: 20 },
      offset: { type: "integer", minimum: 0, default: 0 },
    },
  },
};

const applySchema = {
  params: schemeIdParamsSchema,
  body: {
    type: "object",
    additionalProperties: false,
    properties: {},
  },
};

export async function registerSchemeRoutes(app: FastifyInstance) {
  app.get<{ Querystring: { search?: string; limit: number; offset: number } }>(
    "/api/v1/schemes",
    { schema: listSchemesSchema },
    async (request) => {
      const { search, limit, offset } = request.query;
      const items = await schemes.listSchemes({ search, limit, offset });
      return { schemes: items, limit, offset };
    }
  );

  app.get<SchemeParams>(
    "/api/v1/schemes/:schemeId",
    { schema: { params: schemeIdParamsSchema } },
    async (request, reply) => {
      const scheme = await schemes.getScheme(request.params.schemeId);
      if (!scheme) return send404(reply, "SCHEME_NOT_FOUND");
      return { scheme };
    }
  );

  app.get<SchemeParams>(
    "/api/v1/schemes/:schemeId/eligibility",
    { schema: { params: schemeIdParamsSchema } },
    async (request, reply) => {
      const farmerId = requireFarmerId(request, reply);
      if (farmerId === null) return;
      const check = await checkSchemeEligibility(createDefaultEligibilityContext(), farmerId, request.params.schemeId);
      if (check.status !== "EVALUATED") {
        return send404(reply, check.status, check.verdict.reasons[0]);
      }
      return { schemeId: check.scheme.id, verdict: check.verdict };
    }
  );

  app.post<SchemeParams>("/api/v1/schemes/:schemeId/apply", { schema: applySchema }, async (request, reply) => {
    const farmerId = requireFarmerId(request, reply);
    if (farmerId === null) return;

    const result = await manualApplyForScheme(createDefaultEligibilityContext(), farmerId, request.params.schemeId);
    switch (result.outcome) {
      case "APPLIED":
        reply.code(201);
        return { application: result.application, verdict: result.verdict };
      case "FARMER_NOT_FOUND":
      case "SCHEME_NOT_FOUND":
        return send404(reply, result.outcome);
      case "SCHEME_INACTIVE":
        return send400(reply, "SCHEME_INACTIVE", "This scheme is not accepting applications");
      case "ALREADY_APPLIED":
        reply.code(409);
        return {
          error: "ALREADY_APPLIED",
          message: "You have already applied for this scheme",
          statusCode: 409,
          applicationId: result.applicationId,
        };
      case "INELIGIBLE":
        reply.code(400);
        return {
          error: "INELIGIBLE",
          message: "You do not meet the eligibility criteria for this scheme",
          statusCode: 400,
          verdict: result.verdict,
        };
      case "MISSING_DOCUMENTS":
        reply.code(400);
        return {
          error: "MISSING_DOCUMENTS",
          message: `Missing required documents: ${result.verdict.missingDocuments.join(", ")}`,
          statusCode: 400,
          verdict: result.verdict,
        };
    }
  });
}
