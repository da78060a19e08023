// src/lib/cookie.ts
// Purpose: Cookie header parser for the XSRF double-submit check

export function parseCookies(cookieHeader?: string): Record<string, string> {
  const cookies: Record<string, string> = {};

  if (!cookieHeader) return cookies;

  cookieHeader.split(";").forEach((cookie) => {
    const [rawKey, ...rest] = cookie.trim().split("=");
    const key = rawKey.trim();
    if (!key || rest.length === 0) return;

    // First occurrence wins, matching browser ordering (most specific path first)
    if (key in cookies) return;

    cookies[key] = safeDecode(rest.join("=").trim());
  });

  return cookies;
}

function safeDecode(value: string): string {
  const unquoted =
    value.length >= 2 && value.startsWith('"') && value.endsWith('"')
      ? value.slice(1, -1)
      : value;

  try {
    return decodeURIComponent(unquoted);
  } catch {
    return unquoted;
  }
}
