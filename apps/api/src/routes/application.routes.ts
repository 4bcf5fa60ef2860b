import type { FastifyInstance } from "fastify";
import { APPLICATION_ID_PATTERN, type ApplicationStatus } from "@agroscheme/shared";
import * as applications from "../applications";
import { send403, send404 } from "../errors";
import { canReadApplication, requireFarmerId } from "../route-access";

export const applicationIdParamsSchema = {
  type: "object",
  required: ["applicationId"],
  additionalProperties: false,
  properties: {
    applicationId: { type: "string", pattern: APPLICATION_ID_PATTERN.source },
  },
};

const listApplicationsSchema = {
  querystring: {
    type: "object",
    additionalProperties: false,
    properties: {
      status: { type: "string", enum: ["PENDING", "UNDER_REVIEW", "APPROVED", "REJECTED", "DOCS_NEEDED"] },
      limit: { type: "integer", minimum: 1, maximum: 100, default: 50 },
      offset: { type: "integer", minimum: 0, default: 0 },
    },
  },
};

export async function registerApplicationRoutes(app: FastifyInstance) {
  app.get<{ Querystring: { status?: ApplicationStatus; limit: number; offset: number } }>(
    "/api/v1/applications",
    { schema: listApplicationsSchema },
    async (request, reply) => {
      const farmerId = requireFarmerId(request, reply);
      if (farmerId === null) return;
      const { status, limit, offset } = request.query;
      const items = await applications.listFarmerApplications(farmerId, status, limit, offset);
      return { applications: items, limit, offset };
    }
  );

  app.get<{ Params: { applicationId: string } }>(
    "/api/v1/applications/:applicationId",
    { schema: { params: applicationIdParamsSchema } },
    async (request, reply) => {
      const farmerId = requireFarmerId(request, reply);
      if (farmerId === null) return;
      const application = await applications.getApplicationById(request.params.applicationId);
      if (!application) return send404(reply, "APPLICATION_NOT_FOUND");
      if (!canReadApplication(request, application)) {
        return send403(reply, "FORBIDDEN", "You are not allowed to view this application");
      }
      return { application };
    }
  );
}
