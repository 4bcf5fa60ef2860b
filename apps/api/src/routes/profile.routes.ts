import type { FastifyInstance } from "fastify";
import { UpdateFarmerProfileInputSchema } from "@agroscheme/shared";
import { updateAutoApplyPreference, updateFarmerProfile } from "../auth";
import { send400, send404 } from "../errors";
import { requireFarmerId } from "../route-access";

const preferencesSchema = {
  body: {
    type: "object",
    required: ["autoApplyEnabled"],
    additionalProperties: false,
    properties: {
      autoApplyEnabled: { type: "boolean" },
    },
  },
};

const updateProfileSchema = {
  body: {
    type: "object",
    additionalProperties: false,
    minProperties: 1,
    properties: {
      fullName: { type: "string", minLength: 1, maxLength: 120 },
      email: { type: ["string", "null"], maxLength: 254 },
      state: { type: "string", minLength: 1, maxLength: 100 },
      district: { type: "string", minLength: 1, maxLength: 100 },
      village: { type: ["string", "null"], maxLength: 100 },
      language: { type: "string", enum: ["en", "hi", "mr"] },
    },
  },
};

export async function registerProfileRoutes(app: FastifyInstance) {
  app.patch<{ Body: { autoApplyEnabled: boolean } }>(
    "/api/v1/profile/me/preferences",
    { schema: preferencesSchema },
    async (request, reply) => {
      const farmerId = requireFarmerId(request, reply);
      if (farmerId === null) return;
      const farmer = await updateAutoApplyPreference(farmerId, request.body.autoApplyEnabled);
      if (!farmer) return send404(reply, "FARMER_NOT_FOUND");
      return { farmer };
    }
  );

  app.put("/api/v1/profile/me", { schema: updateProfileSchema }, async (request, reply) => {
    const farmerId = requireFarmerId(request, reply);
    if (farmerId === null) return;

    const parsed = UpdateFarmerProfileInputSchema.safeParse(request.body);
    if (!parsed.success) {
      return send400(reply, "INVALID_REQUEST_BODY", parsed.error.issues[0]?.message);
    }
    const farmer = await updateFarmerProfile(farmerId, parsed.data);
    if (!farmer) return send404(reply, "FARMER_NOT_FOUND");
    return { farmer };
  });
}
