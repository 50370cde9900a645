export type UrlCheck =
  | { ok: true; url: string }
  | { ok: false; error: 'Missing url' | 'Invalid URL' };

/**
 * Trims the input, defaults the scheme to https and requires a host.
 */
export function normalizeScanUrl(raw: string): UrlCheck {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return { ok: false, error: 'Missing url' };
  }

  const withScheme = /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;

  let parsed: URL;
  try {
    parsed = new URL(withScheme);
  } catch {
    return { ok: false, error: 'Invalid URL' };
  }

  if (!parsed.host) {
    return { ok: false, error: 'Invalid URL' };
  }

  return { ok: true, url: withScheme };
}
