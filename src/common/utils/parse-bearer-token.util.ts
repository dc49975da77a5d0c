const BEARER_PATTERN = /^\s*bearer(?:\s+(.*))?$/i;

export function parseBearerToken(raw: string | undefined | null): string | null {
  if (!raw) return null;
  const match = BEARER_PATTERN.exec(raw);
  if (match) {
    return match[1]?.trim() || null;
  }
  return raw.trim() || null;
}
