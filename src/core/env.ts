/**
 * Centralized environment configuration for the recon pipeline
 *
 * All environment variables should be accessed through this module to ensure:
 * - Type safety with proper parsing
 * - Sensible defaults
 * - Single source of truth
 *
 * Values are read when the module is first imported; the CLI loads `.env`
 * through dotenv before that happens.
 */

// =============================================================================
// Helper Functions
// =============================================================================

function parseIntEnv(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseBoolEnv(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

function parseStringEnv(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

// =============================================================================
// Runtime Environment
// =============================================================================

export const env = {
  /** Current environment: 'production' | 'development' | 'test' */
  NODE_ENV: parseStringEnv('NODE_ENV', 'development'),
  /** Is production environment */
  isProduction: process.env.NODE_ENV === 'production',
  /** Is test environment */
  isTest: process.env.NODE_ENV === 'test',
  /** Log level override: 'debug' | 'info' | 'warn' | 'error' */
  LOG_LEVEL: parseStringEnv('LOG_LEVEL', 'info').toLowerCase(),
} as const;

// =============================================================================
// Fetch Scheduler
// =============================================================================

export const scanner = {
  /** Global in-flight request ceiling */
  CONCURRENCY: parseIntEnv('RECON_CONCURRENCY', 80),
  /** Per-attempt timeout covering connect, headers and body */
  REQUEST_TIMEOUT_MS: parseIntEnv('RECON_REQUEST_TIMEOUT_MS', 10_000),
  /** Redirect hops followed before reporting RedirectLoop */
  MAX_REDIRECTS: parseIntEnv('RECON_MAX_REDIRECTS', 5),
  /** Response bodies are cut at this many bytes */
  MAX_BODY_BYTES: parseIntEnv('RECON_MAX_BODY_BYTES', 1024 * 1024),
  /** Linked JS assets fetched per HTML page */
  MAX_ASSETS_PER_PAGE: parseIntEnv('RECON_MAX_ASSETS_PER_PAGE', 25),
  /** Retry once over http when https cannot connect */
  SCHEME_FALLBACK: parseBoolEnv('RECON_SCHEME_FALLBACK', true),
  /** Environment hosts commonly run self-signed certificates */
  TLS_VERIFY: parseBoolEnv('RECON_TLS_VERIFY', false),
  USER_AGENT: parseStringEnv(
    'RECON_USER_AGENT',
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36'
  ),
} as const;

// =============================================================================
// Sandboxed Evaluation
// =============================================================================

export const evaluation = {
  /** Wall-clock budget per script */
  TIME_BUDGET_MS: parseIntEnv('RECON_EVAL_TIME_BUDGET_MS', 250),
  /** Interpreter steps per script */
  MAX_STEPS: parseIntEnv('RECON_EVAL_MAX_STEPS', 200_000),
  /** Larger bodies are mined by pattern only */
  MAX_SOURCE_BYTES: parseIntEnv('RECON_EVAL_MAX_SOURCE_BYTES', 512 * 1024),
  /** Longest string the interpreter may build */
  MAX_STRING_LENGTH: parseIntEnv('RECON_EVAL_MAX_STRING_LENGTH', 4096),
} as const;

// =============================================================================
// Output
// =============================================================================

export const output = {
  /** Written beside the input file unless --output is given */
  FILE_NAME: parseStringEnv('RECON_OUTPUT_FILE', 'env-enum.txt'),
  BACKUP_SUFFIX: '.bak',
} as const;

export default { env, scanner, evaluation, output };
