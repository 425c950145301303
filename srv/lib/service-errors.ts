export const NOT_FOUND_STATUS = 404;

/**
 * Status code carried by a backing-store error.
 * Azure's `RestError` exposes `statusCode`; other clients use a numeric `code`.
 */
export function getStatusCode(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("statusCode" in err && typeof err.statusCode === "number") {
    return err.statusCode;
  }
  if ("code" in err && typeof err.code === "number") {
    return err.code;
  }
  return undefined;
}

export function isNotFound(err: unknown): boolean {
  return getStatusCode(err) === NOT_FOUND_STATUS;
}
