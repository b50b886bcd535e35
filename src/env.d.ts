/**
 * Environment variable type definitions
 */

declare global {
  namespace NodeJS {
    interface ProcessEnv {
      NODE_ENV?: 'development' | 'production' | 'test';
      LOG_LEVEL?: string;

      // Fetch scheduler
      RECON_CONCURRENCY?: string;
      RECON_REQUEST_TIMEOUT_MS?: string;
      RECON_MAX_REDIRECTS?: string;
      RECON_MAX_BODY_BYTES?: string;
      RECON_MAX_ASSETS_PER_PAGE?: string;
      RECON_SCHEME_FALLBACK?: string;
      RECON_TLS_VERIFY?: string;
      RECON_USER_AGENT?: string;

      // Sandboxed evaluation
      RECON_EVAL_TIME_BUDGET_MS?: string;
      RECON_EVAL_MAX_STEPS?: string;
      RECON_EVAL_MAX_SOURCE_BYTES?: string;
      RECON_EVAL_MAX_STRING_LENGTH?: string;

      // Output
      RECON_OUTPUT_FILE?: string;
    }
  }
}

export {};
