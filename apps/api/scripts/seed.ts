/**
 * Seed script: an administrator, a demo farmer and the schemes in seed-schemes.json.
 * Run: npx tsx scripts/seed.ts (from apps/api)
 */
import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";
import { CreateSchemeInputSchema } from "@agroscheme/shared";
import { query } from "../src/db";
import { generateFarmerCode, hashPassword } from "../src/auth";
import { createScheme } from "../src/schemes";

const SCHEMES_FILE = path.resolve(__dirname, "seed-schemes.json");

interface SeedAccount {
  fullName: string;
  mobileNumber: string;
  role: "FARMER" | "ADMIN";
  autoApplyEnabled: boolean;
}

const ACCOUNTS: SeedAccount[] = [
  { fullName: "Portal Administrator", mobileNumber: "9000000001", role: "ADMIN", autoApplyEnabled: false },
  { fullName: "Demo Farmer", mobileNumber: "9000000002", role: "FARMER", autoApplyEnabled: true },
];

async function seedAccounts(password: string) {
  const passwordHash = await hashPassword(password);
  for (const account of ACCOUNTS) {
    const result = await query(
      `INSERT INTO farmer
         (farmer_code, full_name, mobile_number, password_hash, state, district, language, role, auto_apply_enabled)
       VALUES ($1, $2, $3, $4, 'Maharashtra', 'Pune', 'en', $5, $6)
       ON CONFLICT ON CONSTRAINT farmer_mobile_number_key DO NOTHING`,
      [generateFarmerCode(), account.fullName, account.mobileNumber, passwordHash, account.role, account.autoApplyEnabled]
    );
    const state = result.rowCount ? "created" : "already present";
    console.log(`  ${account.role.toLowerCase()} ${account.mobileNumber}: ${state}`);
  }
}

async function seedSchemes() {
  const raw: unknown = JSON.parse(await fs.readFile(SCHEMES_FILE, "utf-8"));
  const schemes = z.array(CreateSchemeInputSchema).parse(raw);
  for (const input of schemes) {
    try {
      const scheme = await createScheme(input);
      console.log(`  scheme ${scheme.scheme_code}: created (id ${scheme.id})`);
    } catch (error: unknown) {
      if (error instanceof Error && error.message === "SCHEME_CODE_EXISTS") {
        console.log(`  scheme ${input.schemeCode}: already present`);
        continue;
      }
      throw error;
    }
  }
}

async function main() {
  const password = process.env.SEED_PASSWORD;
  if (!password || password.length < 8) {
    throw new Error("SEED_PASSWORD (8+ characters) must be set to seed accounts");
  }
  console.log("Seeding...");
  await seedAccounts(password);
  // Auto-apply is not run here: seeded schemes predate any uploaded documents.
  await seedSchemes();
  console.log("Seed complete.");
  process.exit(0);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
