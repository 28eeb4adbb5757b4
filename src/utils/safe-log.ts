/**
 * Safe error logging utility.
 * In production, strips stack traces and internal details to avoid
 * leaking message bodies or tokens to logs that may be forwarded externally.
 */

export function safeError(error: unknown): unknown {
  if (process.env.NODE_ENV !== 'production') {
    return error
  }

  if (error instanceof Error) {
    return { message: error.message, name: error.name }
  }

  if (typeof error === 'string') {
    return error
  }

  return '[non-Error thrown]'
}

/** Shortens free text for log lines. */
export function preview(text: string, max = 60): string {
  const flat = text.replace(/\s+/g, ' ').trim()
  return flat.length > max ? `${flat.slice(0, max - 1)}…` : flat
}
