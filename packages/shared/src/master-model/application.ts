/**
 * Application header schema and status lifecycle.
 *
 * `status` is the canonical application state. `statusHistory` is an
 * append-only audit trail: every transition adds one entry and no entry is
 * ever rewritten.
 */
import { z } from "zod";
import { ISODateTime, NonNegativeAmount } from "./primitives";

export const ApplicationStatusEnum = z.enum([
  "PENDING",
  "UNDER_REVIEW",
  "APPROVED",
  "REJECTED",
  "DOCS_NEEDED",
]);

export type ApplicationStatus = z.infer<typeof ApplicationStatusEnum>;

export const ApplicationOriginEnum = z.enum(["AUTO", "MANUAL"]);

export type ApplicationOrigin = z.infer<typeof ApplicationOriginEnum>;

export const StatusChangeSchema = z.object({
  status: ApplicationStatusEnum,
  timestamp: ISODateTime,
  approvedAmount: NonNegativeAmount.nullable(),
  remarks: z.string().optional(),
  changedBy: z.string().optional(),       // farmer id of the admin, or "SYSTEM"
});

export type StatusChange = z.infer<typeof StatusChangeSchema>;

export const StatusHistorySchema = z.array(StatusChangeSchema);

export const APPLICATION_STATUS_TRANSITIONS: Readonly<
  Record<ApplicationStatus, readonly ApplicationStatus[]>
> = {
  PENDING: ["UNDER_REVIEW", "APPROVED", "REJECTED", "DOCS_NEEDED"],
  UNDER_REVIEW: ["APPROVED", "REJECTED"],
  DOCS_NEEDED: ["APPROVED", "REJECTED"],
  APPROVED: [],
  REJECTED: [],
};

export function canTransitionStatus(from: ApplicationStatus, to: ApplicationStatus): boolean {
  return APPLICATION_STATUS_TRANSITIONS[from].includes(to);
}

/** Largest value the `NUMERIC(14, 2)` approved-amount column holds. */
export const MAX_APPROVED_AMOUNT = 999_999_999_999.99;

export const UpdateApplicationStatusInputSchema = z.object({
  status: ApplicationStatusEnum,
  approvedAmount: NonNegativeAmount.max(MAX_APPROVED_AMOUNT).optional(),
  remarks: z.string().max(2000).optional(),
});

export type UpdateApplicationStatusInput = z.infer<typeof UpdateApplicationStatusInputSchema>;

/** `APP` + UTC date (YYYYMMDD) + six upper-case hex characters. */
export const APPLICATION_ID_PATTERN = /^APP\d{8}[0-9A-F]{6}$/;
