import { z } from "zod";
import {
  SchemeCriteriaSchema,
  type ParsedCreateSchemeInput,
  type SchemeCriteria,
} from "@agroscheme/shared";
import { query, uniqueViolationConstraint } from "./db";
import { logInfo, logWarn } from "./logger";

export interface Scheme {
  id: number;
  scheme_code: string;
  scheme_name: string;
  description: string | null;
  scheme_type: string | null;
  department: string | null;
  benefit_amount: number | null;
  last_date: string | null;
  is_active: boolean;
  eligibility_criteria: SchemeCriteria;
  required_documents: string[];
  created_at: Date;
}

export type SchemeRow = {
  id: number;
  scheme_code: string;
  scheme_name: string;
  description: string | null;
  scheme_type: string | null;
  department: string | null;
  benefit_amount: string | number | null;
  last_date: string | null;
  is_active: boolean;
  eligibility_criteria: unknown;
  required_documents: unknown;
  created_at: Date;
};

// DATE is read as text so it never shifts with the server time zone.
export const SCHEME_COLUMNS =
  "id, scheme_code, scheme_name, description, scheme_type, department, benefit_amount, to_char(last_date, 'YYYY-MM-DD') AS last_date, is_active, eligibility_criteria, required_documents, created_at";

const RequiredDocumentsSchema = z.array(z.string());

/**
 * Criteria that fail validation are dropped rather than failing the read,
 * so a bad row can never disqualify anyone.
 */
export function rowToScheme(row: SchemeRow): Scheme {
  const criteria = SchemeCriteriaSchema.safeParse(row.eligibility_criteria ?? {});
  if (!criteria.success) {
    logWarn("Ignoring invalid scheme criteria", { schemeId: row.id });
  }
  const documents = RequiredDocumentsSchema.safeParse(row.required_documents ?? []);
  return {
    ...row,
    benefit_amount: row.benefit_amount === null ? null : Number(row.benefit_amount),
    eligibility_criteria: criteria.success ? criteria.data : {},
    required_documents: documents.success ? documents.data : [],
  };
}

export async function createScheme(input: ParsedCreateSchemeInput): Promise<Scheme> {
  try {
    const result = await query<SchemeRow>(
      `INSERT INTO scheme
         (scheme_code, scheme_name, description, scheme_type, department, benefit_amount, last_date, is_active, eligibility_criteria, required_documents)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9::jsonb, $10::jsonb)
       RETURNING ${SCHEME_COLUMNS}`,
      [
        input.schemeCode,
        input.schemeName,
        input.description ?? null,
        input.schemeType ?? null,
        input.department ?? null,
        input.benefitAmount ?? null,
        input.lastDate ?? null,
        input.isActive,
        JSON.stringify(input.eligibilityCriteria),
        JSON.stringify(input.requiredDocuments),
      ]
    );
    const scheme = rowToScheme(result.rows[0]);
    logInfo("Scheme created", { schemeId: scheme.id, schemeCode: scheme.scheme_code });
    return scheme;
  } catch (error: unknown) {
    if (uniqueViolationConstraint(error) === "scheme_scheme_code_key") {
      throw new Error("SCHEME_CODE_EXISTS");
    }
    throw error;
  }
}

export async function getScheme(schemeId: number): Promise<Scheme | null> {
  const result = await query<SchemeRow>(`SELECT ${SCHEME_COLUMNS} FROM scheme WHERE id = $1`, [schemeId]);
  return result.rows.length > 0 ? rowToScheme(result.rows[0]) : null;
}

/**
 * Soft delete: the scheme stops appearing in listings and accepting
 * applications. Existing applications keep their snapshot. Null when the
 * scheme does not exist.
 */
export async function deactivateScheme(schemeId: number): Promise<Scheme | null> {
  const result = await query<SchemeRow>(
    `UPDATE scheme SET is_active = false, updated_at = NOW() WHERE id = $1 RETURNING ${SCHEME_COLUMNS}`,
    [schemeId]
  );
  if (result.rows.length === 0) return null;
  const scheme = rowToScheme(result.rows[0]);
  logInfo("Scheme deactivated", { schemeId: scheme.id, schemeCode: scheme.scheme_code });
  return scheme;
}

export interface ListSchemesOptions {
  search?: string;
  limit?: number;
  offset?: number;
}

/** Active schemes, newest first. */
export async function listSchemes(options: ListSchemesOptions = {}): Promise<Scheme[]> {
  const params: unknown[] = [];
  let sql = `SELECT ${SCHEME_COLUMNS} FROM scheme WHERE is_active = true`;
  if (options.search) {
    params.push(`%${options.search}%`);
    sql += ` AND (scheme_name ILIKE $${params.length} OR description ILIKE $${params.length})`;
  }
  params.push(options.limit ?? 50, options.offset ?? 0);
  sql += ` ORDER BY created_at DESC LIMIT $${params.length - 1} OFFSET $${params.length}`;

  const result = await query<SchemeRow>(sql, params);
  return result.rows.map(rowToScheme);
}
