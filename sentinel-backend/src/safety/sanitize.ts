/**
 * Input sanitization for tool arguments.
 */

// ---------------------------------------------------------------------------
// Generic input sanitization
// ---------------------------------------------------------------------------

/**
 * Strip null bytes, control characters (except newline/tab), and truncate
 * to a safe maximum length. Use for any free-text input.
 */
export function sanitizeInput(input: string, maxLength: number = 10_000): string {
  return input
    // Remove null bytes
    .replace(/\0/g, '')
    // Remove control characters except \n (0x0A) and \t (0x09)
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
    // Truncate
    .slice(0, maxLength);
}

/** Apply sanitizeInput to every top-level string argument. */
export function sanitizeArgs(args: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(args)) {
    sanitized[key] = typeof value === 'string' ? sanitizeInput(value) : value;
  }
  return sanitized;
}

// ---------------------------------------------------------------------------
// Service ids
// ---------------------------------------------------------------------------

export const SERVICE_ID_PATTERN = /^[a-zA-Z0-9_-]+$/;
