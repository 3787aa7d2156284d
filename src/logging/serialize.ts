/**
 * Safe object serialization for log entries.
 */

/**
 * Plain-JSON copy of a value.
 * Circular or otherwise unserializable values become a marker string instead of throwing.
 */
export function serializeForLog(obj: unknown): unknown {
  try {
    if (obj === null || obj === undefined) return obj;
    if (obj instanceof Error) return errorToLog(obj);
    if (typeof obj !== "object") return obj;
    return JSON.parse(JSON.stringify(obj));
  } catch (err) {
    const errorMsg = err instanceof Error ? err.message : "unknown error";
    return `[Unserializable object: ${errorMsg}]`;
  }
}

/**
 * Truncate a string to a maximum length, appending "..." when cut.
 */
export function truncateString(str: string, maxLength: number = 500): string {
  if (str.length <= maxLength) return str;
  return str.substring(0, maxLength) + "...";
}

/**
 * Log shape of an error. Errors with a toJSON (CarrierIntegrationError) use it.
 */
export function errorToLog(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    if ("toJSON" in error && typeof error.toJSON === "function") {
      return { type: error.name, ...JSON.parse(JSON.stringify(error)) };
    }
    return {
      type: error.name,
      message: error.message,
    };
  }

  if (typeof error === "object" && error !== null) {
    return { value: serializeForLog(error) };
  }

  return {
    type: typeof error,
    message: String(error),
  };
}
