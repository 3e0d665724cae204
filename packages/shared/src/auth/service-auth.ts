export const SERVICE_AUTH_HEADER = "x-service-token";

function configuredToken(token: string | undefined): string | null {
  const trimmed = (token || "").trim();
  return trimmed.length > 0 ? trimmed : null;
}

/** True when no token is configured, or when any value of the header matches it. */
export function isServiceAuthAuthorized(providedHeader: unknown, expectedToken: string | undefined): boolean {
  const expected = configuredToken(expectedToken);
  if (!expected) return true;

  const provided: unknown[] = Array.isArray(providedHeader) ? providedHeader : [providedHeader];
  return provided.some((value) => value === expected);
}
