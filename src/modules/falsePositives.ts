/* =============================================================================
 * MODULE: falsePositives.ts
 * =============================================================================
 * Challenge, captcha and soft-error pages that answer 2xx on every path.
 * Patterns are structural (title tags, captcha form attributes) so pages that
 * merely mention these words are not filtered.
 * =============================================================================
 */

export const FALSE_POSITIVE_PATTERNS: readonly RegExp[] = [
  // SiteGround captcha
  /class="?sg-captcha/i,
  /sgcaptcha.*verify/i,
  /\.well-known\/sgcaptcha/i,
  /meta.*refresh.*sgcaptcha/i,

  // Cloudflare challenge pages
  /cf-challenge-running/i,
  /data-ray.*data-sitekey/i,
  /<title>.*Attention Required.*Cloudflare/i,
  /<title>.*Just a moment.*Cloudflare/i,

  // CAPTCHA forms
  /g-recaptcha.*data-sitekey/i,
  /h-captcha.*data-sitekey/i,

  // Soft 404s, only in title tags
  /<title>\s*404\b/i,
  /<title>\s*Not Found\s*</i,
  /<title>\s*Page Not Found\s*</i,

  // Access denied
  /<title>\s*403\s*</i,
  /<title>\s*Access Denied\s*</i,
  /<title>\s*Forbidden\s*</i,
  /<title>\s*Unauthorized\s*</i,
];

// Patterns only look at the head of the page
const SCAN_WINDOW = 16 * 1024;

export function isFalsePositivePage(body: string): boolean {
  const head = body.length > SCAN_WINDOW ? body.slice(0, SCAN_WINDOW) : body;
  return FALSE_POSITIVE_PATTERNS.some((pattern) => pattern.test(head));
}
