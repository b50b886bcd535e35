/**
 * Shared validation utilities for host and option input
 */

/**
 * One DNS label: alphanumeric, inner hyphens, 1-63 chars
 */
const LABEL_REGEX = /^[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?$/;

const IPV4_REGEX = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

/**
 * Maximum host length per RFC 1035
 */
const MAX_HOST_LENGTH = 253;

/**
 * Minimal hostname shape check: at least one dot and only label characters
 */
export function isValidHostname(host: unknown): host is string {
  if (!host || typeof host !== 'string') return false;
  if (host.length > MAX_HOST_LENGTH) return false;
  if (!host.includes('.')) return false;

  return host.split('.').every((label) => LABEL_REGEX.test(label));
}

/**
 * Dotted-quad IPv4 address with every octet in range
 */
export function isIpv4Address(host: unknown): host is string {
  if (!host || typeof host !== 'string') return false;
  const match = IPV4_REGEX.exec(host);
  if (!match) return false;
  return match.slice(1).every((octet) => Number(octet) <= 255);
}

/**
 * Strict positive integer check for user-supplied counts
 */
export function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}
