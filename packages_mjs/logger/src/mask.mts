/**
 * Credential masking for log output
 */

const SENSITIVE_HEADERS = new Set(['authorization', 'x-api-key', 'proxy-authorization']);

/**
 * Mask the userinfo part of a proxy URL
 */
export function maskProxyUrl(url: string | null | undefined): string {
  if (!url) return 'none';
  const atPos = url.lastIndexOf('@');
  if (atPos === -1) return url;
  const protocolEnd = url.indexOf('://');
  if (protocolEnd === -1 || protocolEnd > atPos) return url;
  return `${url.slice(0, protocolEnd + 3)}***@${url.slice(atPos + 1)}`;
}

/**
 * Mask a secret, keeping the first ten characters
 */
export function maskValue(value: string): string {
  if (!value) return '<empty>';
  if (value.length <= 10) return '*'.repeat(value.length);
  return value.slice(0, 10) + '*'.repeat(value.length - 10);
}

/**
 * Copy of headers with auth values masked
 */
export function maskHeaders(headers: Record<string, string>): Record<string, string> {
  const masked: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    masked[key] = SENSITIVE_HEADERS.has(key.toLowerCase()) ? maskValue(value) : value;
  }
  return masked;
}
