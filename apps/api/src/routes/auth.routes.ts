import type { FastifyInstance } from "fastify";
import { FarmerRegistrationSchema } from "@agroscheme/shared";
import * as auth from "../auth";
import { generateToken } from "../middleware/auth";
import { send400, send401, send404, send409 } from "../errors";
import { requireFarmerId } from "../route-access";

const registerSchema = {
  body: {
    type: "object",
    required: ["fullName", "mobileNumber", "password", "state", "district"],
    additionalProperties: false,
    properties: {
      fullName: { type: "string", minLength: 1, maxLength: 120 },
      mobileNumber: { type: "string", minLength: 10, maxLength: 16 },
      email: { type: "string" },
      password: { type: "string", minLength: 8, maxLength: 128 },
      state: { type: "string", minLength: 1 },
      district: { type: "string", minLength: 1 },
      village: { type: "string" },
      language: { type: "string", enum: ["en", "hi", "mr"] },
      autoApplyEnabled: { type: "boolean" },
    },
  },
};

const loginSchema = {
  body: {
    type: "object",
    required: ["mobileNumber", "password"],
    additionalProperties: false,
    properties: {
      mobileNumber: { type: "string", minLength: 1 },
      password: { type: "string", minLength: 1 },
    },
  },
};

export async function registerAuthRoutes(app: FastifyInstance) {
  app.post("/api/v1/auth/register", { schema: registerSchema }, async (request, reply) => {
    const parsed = FarmerRegistrationSchema.safeParse(request.body);
    if (!parsed.success) {
      return send400(reply, "INVALID_REQUEST_BODY", parsed.error.issues[0]?.message);
    }
    try {
      const farmer = await auth.registerFarmer(parsed.data);
      reply.code(201);
      return { farmer, token: generateToken(farmer) };
    } catch (error: unknown) {
      if (error instanceof Error && error.message === "MOBILE_ALREADY_REGISTERED") {
        return send409(reply, "MOBILE_ALREADY_REGISTERED", "This mobile number is already registered");
      }
      throw error;
    }
  });

  app.post<{ Body: { mobileNumber: string; password: string } }>(
    "/api/v1/auth/login",
    { schema: loginSchema, config: { rateLimit: { max: 10, timeWindow: "1 minute" } } },
    async (request, reply) => {
      const mobileNumber = request.body.mobileNumber.replace(/\D/g, "");
      const farmer = await auth.authenticateFarmer(mobileNumber, request.body.password);
      if (!farmer) {
        return send401(reply, "INVALID_CREDENTIALS", "Mobile number or password is incorrect");
      }
      return { farmer, token: generateToken(farmer) };
    }
  );

  app.get("/api/v1/auth/me", async (request, reply) => {
    const farmerId = requireFarmerId(request, reply);
    if (farmerId === null) return;
    const farmer = await auth.getFarmerById(farmerId);
    if (!farmer) return send404(reply, "FARMER_NOT_FOUND");
    return { farmer };
  });
}
