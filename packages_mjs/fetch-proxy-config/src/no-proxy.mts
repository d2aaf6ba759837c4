/**
 * NO_PROXY matching
 */

interface NoProxyEntry {
  host: string;
  port?: number;
}

function parseEntry(raw: string): NoProxyEntry | null {
  let entry = raw.trim().toLowerCase();
  if (!entry) return null;
  if (entry === '*') return { host: '*' };

  if (entry.startsWith('*.')) {
    entry = entry.slice(1);
  }

  // [::1]:8080 style entries
  if (entry.startsWith('[')) {
    const close = entry.indexOf(']');
    const host = entry.slice(1, close);
    const portPart = entry.slice(close + 1);
    return portPart.startsWith(':') ? { host, port: parseInt(portPart.slice(1), 10) } : { host };
  }

  const colon = entry.lastIndexOf(':');
  if (colon !== -1 && entry.indexOf(':') === colon) {
    const port = parseInt(entry.slice(colon + 1), 10);
    if (!Number.isNaN(port)) {
      return { host: entry.slice(0, colon), port };
    }
  }
  return { host: entry };
}

function defaultPort(url: URL): number {
  if (url.port) return parseInt(url.port, 10);
  return url.protocol === 'https:' ? 443 : 80;
}

/**
 * Check whether a target URL bypasses the proxy per a NO_PROXY value
 *
 * Entries are comma or whitespace separated. `*` matches everything,
 * `.example.com` / `*.example.com` match subdomains and the domain itself,
 * `example.com` matches itself and subdomains, `host:port` matches one port.
 */
export function shouldBypassProxy(targetUrl: string | URL, noProxy: string | undefined): boolean {
  if (!noProxy) return false;

  let url: URL;
  try {
    url = typeof targetUrl === 'string' ? new URL(targetUrl) : targetUrl;
  } catch {
    return false;
  }

  const hostname = url.hostname.toLowerCase().replace(/^\[|\]$/g, '');
  const port = defaultPort(url);

  for (const raw of noProxy.split(/[\s,]+/)) {
    const entry = parseEntry(raw);
    if (!entry) continue;
    if (entry.host === '*') return true;
    if (entry.port !== undefined && entry.port !== port) continue;

    const bare = entry.host.startsWith('.') ? entry.host.slice(1) : entry.host;
    if (hostname === bare || hostname.endsWith(`.${bare}`)) {
      return true;
    }
  }
  return false;
}
