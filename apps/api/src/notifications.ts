import { v4 as uuidv4 } from "uuid";
import { query } from "./db";
import { logInfo, logWarn } from "./logger";

export type NotificationType = "auto_apply" | "application_submitted" | "status_update";

export interface NotificationInput {
  farmerId: number;
  title: string;
  message: string;
  type: NotificationType;
  schemeId?: number;
  applicationId?: string;
}

/** Anything that can deliver an in-app notification to a farmer. */
export interface NotificationSink {
  createNotification(input: NotificationInput): Promise<void>;
}

export type Notification = {
  notification_id: string;
  farmer_id: number;
  title: string;
  message: string;
  notification_type: string;
  scheme_id: number | null;
  application_id: string | null;
  read: boolean;
  created_at: Date;
};

export const pgNotificationSink: NotificationSink = {
  async createNotification(input) {
    await query(
      `INSERT INTO notification
         (notification_id, farmer_id, title, message, notification_type, scheme_id, application_id, read, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, false, NOW())`,
      [
        uuidv4(),
        input.farmerId,
        input.title,
        input.message,
        input.type,
        input.schemeId ?? null,
        input.applicationId ?? null,
      ]
    );
  },
};

/**
 * Delivers a notification without letting a failure reach the caller.
 * The work that triggered it has already been committed.
 */
export async function notifyBestEffort(sink: NotificationSink, input: NotificationInput): Promise<boolean> {
  try {
    await sink.createNotification(input);
    logInfo("Notification created", { type: input.type, farmerId: input.farmerId });
    return true;
  } catch (error: unknown) {
    logWarn("Notification delivery failed", {
      type: input.type,
      farmerId: input.farmerId,
      applicationId: input.applicationId,
      error: error instanceof Error ? error.message : "unknown_error",
    });
    return false;
  }
}

export async function getFarmerNotifications(
  farmerId: number,
  limit: number = 20,
  offset: number = 0,
  unreadOnly: boolean = false
): Promise<Notification[]> {
  let sql =
    "SELECT notification_id, farmer_id, title, message, notification_type, scheme_id, application_id, read, created_at FROM notification WHERE farmer_id = $1";
  const params: unknown[] = [farmerId];

  if (unreadOnly) {
    sql += " AND read = false";
  }

  sql += " ORDER BY created_at DESC LIMIT $2 OFFSET $3";
  params.push(limit, offset);

  const result = await query<Notification>(sql, params);
  return result.rows;
}

/** Returns false when the notification does not exist or belongs to someone else. */
export async function markNotificationRead(notificationId: string, farmerId: number): Promise<boolean> {
  const result = await query(
    "UPDATE notification SET read = true WHERE notification_id = $1 AND farmer_id = $2",
    [notificationId, farmerId]
  );
  return (result.rowCount ?? 0) > 0;
}
