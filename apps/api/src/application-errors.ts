/**
 * Storage-level application conflicts.
 *
 * The two unique constraints on `application` mean different things to the
 * caller: a duplicate identifier is retried with a fresh one, a duplicate
 * (farmer, scheme) pair means the farmer has already applied.
 */
import { uniqueViolationConstraint } from "./db";

export type ApplicationConflictKind = "APPLICATION_ID" | "FARMER_SCHEME";

export const APPLICATION_CONSTRAINTS: Readonly<Record<ApplicationConflictKind, string>> = {
  APPLICATION_ID: "application_application_id_key",
  FARMER_SCHEME: "application_farmer_scheme_key",
};

export class ApplicationConflictError extends Error {
  constructor(readonly kind: ApplicationConflictKind) {
    super(`APPLICATION_CONFLICT_${kind}`);
    this.name = "ApplicationConflictError";
  }
}

export function isApplicationConflictError(
  error: unknown,
  kind?: ApplicationConflictKind
): error is ApplicationConflictError {
  return error instanceof ApplicationConflictError && (kind === undefined || error.kind === kind);
}

export class ApplicationIdExhaustedError extends Error {
  constructor(readonly attempts: number) {
    super("APPLICATION_ID_EXHAUSTED");
    this.name = "ApplicationIdExhaustedError";
  }
}

function conflictKindForConstraint(constraint: string): ApplicationConflictKind | null {
  if (constraint === APPLICATION_CONSTRAINTS.APPLICATION_ID) return "APPLICATION_ID";
  if (constraint === APPLICATION_CONSTRAINTS.FARMER_SCHEME) return "FARMER_SCHEME";
  return null;
}

/**
 * Maps a PostgreSQL unique violation on one of the application constraints
 * to an `ApplicationConflictError`. Every other error is returned unchanged.
 */
export function toApplicationConflict(error: unknown): unknown {
  const constraint = uniqueViolationConstraint(error);
  const kind = constraint ? conflictKindForConstraint(constraint) : null;
  return kind ? new ApplicationConflictError(kind) : error;
}
