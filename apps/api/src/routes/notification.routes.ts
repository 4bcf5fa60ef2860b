import type { FastifyInstance } from "fastify";
import { getFarmerNotifications, markNotificationRead } from "../notifications";
import { send404 } from "../errors";
import { requireFarmerId } from "../route-access";

const listNotificationsSchema = {
  querystring: {
    type: "object",
    additionalProperties: false,
    properties: {
      unreadOnly: { type: "boolean", default: false },
      limit: { type: "integer", minimum: 1, maximum: 100, default: 20 },
      offset: { type: "integer", minimum: 0, default: 0 },
    },
  },
};

const markReadSchema = {
  params: {
    type: "object",
    required: ["notificationId"],
    additionalProperties: false,
    properties: {
      notificationId: { type: "string", format: "uuid" },
    },
  },
  body: {
    type: "object",
    additionalProperties: false,
    properties: {},
  },
};

export async function registerNotificationRoutes(app: FastifyInstance) {
  app.get<{ Querystring: { unreadOnly: boolean; limit: number; offset: number } }>(
    "/api/v1/notifications",
    { schema: listNotificationsSchema },
    async (request, reply) => {
      const farmerId = requireFarmerId(request, reply);
      if (farmerId === null) return;
      const { unreadOnly, limit, offset } = request.query;
      const notifications = await getFarmerNotifications(farmerId, limit, offset, unreadOnly);
      return { notifications };
    }
  );

  app.put<{ Params: { notificationId: string } }>(
    "/api/v1/notifications/:notificationId/read",
    { schema: markReadSchema },
    async (request, reply) => {
      const farmerId = requireFarmerId(request, reply);
      if (farmerId === null) return;
      const updated = await markNotificationRead(request.params.notificationId, farmerId);
      if (!updated) return send404(reply, "NOTIFICATION_NOT_FOUND");
      return { success: true };
    }
  );
}
