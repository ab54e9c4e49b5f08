export function getSafeRequestId(input?: string | string[]): string | undefined {
  const val = Array.isArray(input) ? input[0] : input;
  if (!val) return undefined;
  const trimmed = val.trim();
  if (trimmed.length > 128) return undefined;
  const uuidV4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;
  const b64url = /^[A-Za-z0-9_-]{8,64}$/;
  if (uuidV4.test(trimmed) || b64url.test(trimmed)) return trimmed;
  return undefined;
}
