const SUPPORTED_PROXY = /^(https?):\/\/(?:[^@/\s]+@)?[^:@/\s]+:(\d{1,5})\/?$/i;

export interface ParsedProxyList {
  proxies: string[];
  rejected: string[];
}

/**
 * Normalises one proxy line. Bare `host:port` and `user:pass@host:port`
 * entries are treated as http proxies. Returns null for blank lines,
 * comments and anything that is not a scheme://[auth@]host:port URI.
 */
export function normalizeProxyUri(line: string): string | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith('#')) return null;

  const candidate = trimmed.includes('://') ? trimmed : `http://${trimmed}`;
  const match = SUPPORTED_PROXY.exec(candidate);
  if (!match) return null;

  const port = Number(match[2]);
  if (port < 1 || port > 65535) return null;

  const scheme = match[1].toLowerCase();
  const rest = candidate.slice(candidate.indexOf('://') + 3).replace(/\/$/, '');
  return `${scheme}://${rest}`;
}

/**
 * Splits newline-delimited proxy text. Malformed lines are reported in
 * `rejected` and otherwise ignored; duplicates keep their first position.
 * A leading byte-order mark is dropped.
 */
export function parseProxyList(text: string | null | undefined): ParsedProxyList {
  const proxies: string[] = [];
  const rejected: string[] = [];
  if (!text) return { proxies, rejected };

  const seen = new Set<string>();
  for (const line of text.replace(/^\uFEFF/, '').split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const uri = normalizeProxyUri(trimmed);
    if (!uri) {
      rejected.push(trimmed);
      continue;
    }
    if (!seen.has(uri)) {
      seen.add(uri);
      proxies.push(uri);
    }
  }

  return { proxies, rejected };
}
