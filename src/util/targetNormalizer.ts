import { isIpv4Address, isValidHostname } from '../core/validation.js';
import type { Target } from '../core/types.js';
import { createModuleLogger } from '../core/logger.js';

const log = createModuleLogger('targetNormalizer');

export interface TargetValidationResult {
  isValid: boolean;
  /** Blank lines are skipped without a warning */
  isBlank: boolean;
  target?: Target;
  normalizedHost: string;
  originalInput: string;
  validationErrors: string[];
}

export function normalizeTarget(input: string): TargetValidationResult {
  const originalInput = input;
  const errors: string[] = [];

  // Step 1: Basic sanitization
  let host = input.trim().toLowerCase();
  if (!host) {
    return { isValid: false, isBlank: true, normalizedHost: '', originalInput, validationErrors: [] };
  }

  // Step 2: Remove protocols
  host = host.replace(/^https?:\/\//, '');

  // Step 3: Remove path, query and fragment
  host = host.split(/[/?#]/, 1)[0] ?? '';

  // Step 4: Remove user:pass@ userinfo
  const at = host.lastIndexOf('@');
  if (at !== -1) host = host.slice(at + 1);

  // Step 5: Remove port numbers
  host = host.replace(/:\d*$/, '');

  // Step 6: Remove the root-zone dot
  host = host.replace(/\.$/, '');

  // Step 7: Validate host format
  const isIpAddress = isIpv4Address(host);
  if (!host) {
    errors.push('Host cannot be empty');
  } else if (/\s/.test(host)) {
    errors.push('Host contains whitespace');
  } else if (!isIpAddress && !isValidHostname(host)) {
    errors.push('Invalid host format');
  }

  const isValid = errors.length === 0;
  return {
    isValid,
    isBlank: false,
    target: isValid ? { host, isIpAddress } : undefined,
    normalizedHost: host,
    originalInput,
    validationErrors: errors,
  };
}

export interface NormalizedTargets {
  targets: Target[];
  rejected: TargetValidationResult[];
}

/**
 * Normalize input lines, dropping blanks and duplicates in first-seen order
 */
export function normalizeTargets(lines: Iterable<string>): NormalizedTargets {
  const targets: Target[] = [];
  const rejected: TargetValidationResult[] = [];
  const seen = new Set<string>();

  for (const line of lines) {
    const result = normalizeTarget(line);
    if (result.isBlank) continue;

    if (!result.target) {
      log.warn({ input: result.originalInput.trim(), errors: result.validationErrors }, 'Skipping invalid target');
      rejected.push(result);
      continue;
    }

    if (seen.has(result.target.host)) continue;
    seen.add(result.target.host);

    if (result.target.isIpAddress) {
      log.warn({ host: result.target.host }, 'IP address target: no environment permutations or JS mining');
    }
    targets.push(result.target);
  }

  return { targets, rejected };
}
