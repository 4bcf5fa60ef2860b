import type { FastifyReply, FastifyRequest } from "fastify";
import { getAuthFarmerId, isAdminRequest, send401, send403 } from "./errors";
import type { ApplicationRecord } from "./applications";

/**
 * Returns the authenticated farmer id, or sends 401 and returns null.
 */
export function requireFarmerId(request: FastifyRequest, reply: FastifyReply): number | null {
  const farmerId = getAuthFarmerId(request);
  if (farmerId === null) {
    reply.send(send401(reply, "AUTHENTICATION_REQUIRED"));
    return null;
  }
  return farmerId;
}

/**
 * Returns the admin's farmer id, or sends 401/403 and returns null.
 */
export function requireAdmin(request: FastifyRequest, reply: FastifyReply): number | null {
  const farmerId = requireFarmerId(request, reply);
  if (farmerId === null) return null;
  if (!isAdminRequest(request)) {
    reply.send(send403(reply, "FORBIDDEN", "Administrator access required"));
    return null;
  }
  return farmerId;
}

/** The owning farmer and administrators may read an application. */
export function canReadApplication(request: FastifyRequest, application: Pick<ApplicationRecord, "farmer_id">): boolean {
  return isAdminRequest(request) || getAuthFarmerId(request) === application.farmer_id;
}
