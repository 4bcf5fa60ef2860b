import { randomInt } from "crypto";
import argon2 from "argon2";
import {
  FarmerRoleEnum,
  LanguageEnum,
  type FarmerRegistration,
  type FarmerRole,
  type UpdateFarmerProfileInput,
} from "@agroscheme/shared";
import { query, uniqueViolationConstraint } from "./db";
import { logInfo } from "./logger";

export interface Farmer {
  id: number;
  farmer_code: string;
  full_name: string;
  mobile_number: string;
  email: string | null;
  state: string;
  district: string;
  village: string | null;
  language: string;
  role: FarmerRole;
  auto_apply_enabled: boolean;
  created_at: Date;
}

export type FarmerRow = {
  id: number;
  farmer_code: string;
  full_name: string;
  mobile_number: string;
  email: string | null;
  state: string;
  district: string;
  village: string | null;
  language: string;
  role: string;
  auto_apply_enabled: boolean;
  created_at: Date;
};

export const FARMER_COLUMNS =
  "id, farmer_code, full_name, mobile_number, email, state, district, village, language, role, auto_apply_enabled, created_at";

export function rowToFarmer(row: FarmerRow): Farmer {
  return {
    ...row,
    language: LanguageEnum.catch("en").parse(row.language),
    role: FarmerRoleEnum.parse(row.role),
  };
}

// argon2id with OWASP-recommended parameters
export async function hashPassword(password: string): Promise<string> {
  return argon2.hash(password, {
    type: argon2.argon2id,
    memoryCost: 65536,     // 64 MB
    timeCost: 3,
    parallelism: 1,
  });
}

export async function verifyPassword(password: string, hash: string): Promise<boolean> {
  if (!hash.startsWith("$argon2")) return false;
  return argon2.verify(hash, password);
}

/** `AGRO` + 8 random digits. */
export function generateFarmerCode(): string {
  return `AGRO${String(randomInt(0, 100_000_000)).padStart(8, "0")}`;
}

const FARMER_CODE_ATTEMPTS = 3;

export async function registerFarmer(input: FarmerRegistration): Promise<Farmer> {
  const passwordHash = await hashPassword(input.password);

  for (let attempt = 1; attempt <= FARMER_CODE_ATTEMPTS; attempt++) {
    try {
      const result = await query<FarmerRow>(
        `INSERT INTO farmer
           (farmer_code, full_name, mobile_number, email, password_hash, state, district, village, language, role, auto_apply_enabled)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, 'FARMER', $10)
         RETURNING ${FARMER_COLUMNS}`,
        [
          generateFarmerCode(),
          input.fullName,
          input.mobileNumber,
          input.email ?? null,
          passwordHash,
          input.state,
          input.district,
          input.village || null,
          input.language,
          input.autoApplyEnabled,
        ]
      );
      const farmer = rowToFarmer(result.rows[0]);
      logInfo("Farmer registered", { farmerId: farmer.id, farmerCode: farmer.farmer_code });
      return farmer;
    } catch (error: unknown) {
      const constraint = uniqueViolationConstraint(error);
      if (constraint === "farmer_mobile_number_key") {
        throw new Error("MOBILE_ALREADY_REGISTERED");
      }
      if (constraint !== "farmer_farmer_code_key") throw error;
    }
  }
  throw new Error("FARMER_CODE_EXHAUSTED");
}

/** Null for an unknown mobile number or a wrong password. */
export async function authenticateFarmer(mobileNumber: string, password: string): Promise<Farmer | null> {
  const result = await query<FarmerRow & { password_hash: string }>(
    `SELECT ${FARMER_COLUMNS}, password_hash FROM farmer WHERE mobile_number = $1`,
    [mobileNumber]
  );
  if (result.rows.length === 0) return null;
  const { password_hash: passwordHash, ...row } = result.rows[0];
  const valid = await verifyPassword(password, passwordHash);
  return valid ? rowToFarmer(row) : null;
}

export async function getFarmerById(farmerId: number): Promise<Farmer | null> {
  const result = await query<FarmerRow>(`SELECT ${FARMER_COLUMNS} FROM farmer WHERE id = $1`, [farmerId]);
  return result.rows.length > 0 ? rowToFarmer(result.rows[0]) : null;
}

export async function updateAutoApplyPreference(farmerId: number, enabled: boolean): Promise<Farmer | null> {
  const result = await query<FarmerRow>(
    `UPDATE farmer SET auto_apply_enabled = $2, updated_at = NOW() WHERE id = $1 RETURNING ${FARMER_COLUMNS}`,
    [farmerId, enabled]
  );
  return result.rows.length > 0 ? rowToFarmer(result.rows[0]) : null;
}

const PROFILE_COLUMNS: Record<keyof UpdateFarmerProfileInput, string> = {
  fullName: "full_name",
  email: "email",
  state: "state",
  district: "district",
  village: "village",
  language: "language",
};

function isProfileField(key: string): key is keyof UpdateFarmerProfileInput {
  return key in PROFILE_COLUMNS;
}

/** Updates only the fields present in `input`; null clears email or village. */
export async function updateFarmerProfile(
  farmerId: number,
  input: UpdateFarmerProfileInput
): Promise<Farmer | null> {
  const params: unknown[] = [farmerId];
  const assignments: string[] = [];
  for (const [key, value] of Object.entries(input)) {
    if (value === undefined || !isProfileField(key)) continue;
    params.push(key === "village" && value === "" ? null : value);
    assignments.push(`${PROFILE_COLUMNS[key]} = $${params.length}`);
  }
  if (assignments.length === 0) return getFarmerById(farmerId);

  const result = await query<FarmerRow>(
    `UPDATE farmer SET ${assignments.join(", ")}, updated_at = NOW() WHERE id = $1 RETURNING ${FARMER_COLUMNS}`,
    params
  );
  if (result.rows.length === 0) return null;
  logInfo("Farmer profile updated", { farmerId, fields: Object.keys(input) });
  return rowToFarmer(result.rows[0]);
}
