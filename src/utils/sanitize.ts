import { ValidationError } from './errors.js';

const BLOCKED_PROTOCOLS = ['javascript:', 'data:', 'file:', 'vbscript:'];

export function sanitizeUrl(url: string): string {
  const trimmed = url.trim();
  if (trimmed === '') {
    throw new ValidationError('URL must not be empty');
  }

  const lower = trimmed.toLowerCase();
  for (const protocol of BLOCKED_PROTOCOLS) {
    if (lower.startsWith(protocol)) {
      throw new ValidationError(`Blocked URL protocol: ${protocol}`);
    }
  }

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    throw new ValidationError(`Invalid URL: ${trimmed}`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ValidationError(`Only http and https URLs are allowed, got: ${parsed.protocol}`);
  }

  return parsed.href;
}

/** Quote a value for use inside a CSS attribute selector. */
export function cssString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\a ')}"`;
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
