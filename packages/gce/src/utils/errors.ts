/**
 * Whether a Compute Engine client call failed because the resource does not
 * exist. The REST transport reports HTTP 404; gRPC-mapped errors carry code 5.
 */
export function isNotFoundError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  const code = "code" in error ? error.code : undefined;
  if (code === 404 || code === 5) return true;

  return error.message.includes("NOT_FOUND") || error.message.includes("404");
}
