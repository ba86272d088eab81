import { ValidationError } from '@common/utils/error-handler';
import { isIP, isIPv4 } from 'net';

const HOSTNAME_LABEL = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/i;
const NUMERIC = /^\d+$/;

/**
 * Split a caller-supplied target string (comma and/or whitespace separated) into entries.
 * Duplicates are dropped, first occurrence wins.
 */
export function splitTargets(input: string | string[]): string[] {
  const parts = Array.isArray(input) ? input.flatMap(item => item.split(/[\s,]+/)) : input.split(/[\s,]+/);
  const seen = new Set<string>();
  const result: string[] = [];

  for (const part of parts) {
    const entry = part.trim();
    if (!entry || seen.has(entry)) continue;
    seen.add(entry);
    result.push(entry);
  }

  return result;
}

function ipv4ToNumber(address: string): number {
  return address.split('.').reduce((acc, octet) => acc * 256 + Number(octet), 0);
}

function isValidCidr(entry: string): boolean {
  const [address, prefix, ...rest] = entry.split('/');
  if (rest.length > 0 || !NUMERIC.test(prefix)) return false;

  const version = isIP(address);
  const bits = Number(prefix);
  if (version === 4) return bits <= 32;
  if (version === 6) return bits <= 128;
  return false;
}

// 192.168.1.1-192.168.1.20 or 192.168.1.1-20
function isValidIpv4Range(entry: string): boolean {
  const [start, end, ...rest] = entry.split('-');
  if (rest.length > 0 || !isIPv4(start)) return false;

  if (isIPv4(end)) {
    return ipv4ToNumber(start) <= ipv4ToNumber(end);
  }

  if (NUMERIC.test(end)) {
    const lastOctet = Number(end);
    const startOctet = Number(start.split('.')[3]);
    return lastOctet <= 255 && startOctet <= lastOctet;
  }

  return false;
}

function isValidHostname(entry: string): boolean {
  const hostname = entry.endsWith('.') ? entry.slice(0, -1) : entry;
  if (hostname.length === 0 || hostname.length > 253) return false;

  const labels = hostname.split('.');
  if (!labels.every(label => HOSTNAME_LABEL.test(label))) return false;

  // All-numeric names are malformed IPv4 addresses, not hosts
  return !labels.every(label => NUMERIC.test(label));
}

/**
 * True when the entry is a hostname, an IPv4/IPv6 address, a CIDR block or an IPv4 range
 */
export function isValidTargetEntry(entry: string): boolean {
  if (isIP(entry) !== 0) return true;
  if (entry.includes('/')) return isValidCidr(entry);
  if (entry.includes('-') && isIPv4(entry.split('-')[0])) return isValidIpv4Range(entry);
  return isValidHostname(entry);
}

function isTargetInput(input: unknown): input is string | string[] {
  return typeof input === 'string' || (Array.isArray(input) && input.every(item => typeof item === 'string'));
}

/**
 * Parse and validate a target specification. Throws ValidationError on empty or malformed input.
 */
export function parseTargets(input: unknown, field = 'targets'): string[] {
  if (!isTargetInput(input)) {
    throw new ValidationError(`${field} must be a string or a list of strings`, field, input);
  }

  const entries = splitTargets(input);
  if (entries.length === 0) {
    throw new ValidationError(`${field} must contain at least one host`, field, input);
  }

  const invalid = entries.filter(entry => !isValidTargetEntry(entry));
  if (invalid.length > 0) {
    throw new ValidationError(`Invalid target entries: ${invalid.join(', ')}`, field, invalid);
  }

  return entries;
}
