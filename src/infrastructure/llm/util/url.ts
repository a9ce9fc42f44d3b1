export function joinUrl(baseUrl: string, pathname: string): string {
  const base = baseUrl.replace(/\/+$/, "");
  const path = pathname.replace(/^\/+/, "");
  return path.length > 0 ? `${base}/${path}` : base;
}

/** Shows at most `visibleChars` leading characters and never more than a quarter of the key. */
export function maskApiKey(apiKey: string, visibleChars = 4): string {
  const visible = Math.min(visibleChars, Math.floor(apiKey.length / 4));
  const masked = "*".repeat(Math.min(apiKey.length - visible, 16));
  return `${apiKey.slice(0, visible)}${masked}`;
}
