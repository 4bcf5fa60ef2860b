/**
 * Runtime safety helpers.
 */
export function isTestRuntime(): boolean {
  return process.env.NODE_ENV === "test" || process.env.VITEST === "true";
}

/**
 * Reads a secret that must be configured outside tests. Tests get the
 * given fallback so the suite runs without a .env file.
 */
export function requireRuntimeSecret(name: string, testFallback: string): string {
  const value = process.env[name];
  if (value) return value;
  if (!isTestRuntime()) {
    throw new Error(`FATAL: ${name} environment variable must be set in non-test runtime`);
  }
  return testFallback;
}

export function parsePositiveIntEnv(name: string, fallback: number): number {
  const parsed = Number.parseInt(process.env[name] || "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}
