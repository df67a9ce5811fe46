/**
 * Safe error logging utility.
 * In production, strips stack traces and internal details to avoid
 * leaking sensitive information to logs that may be forwarded externally.
 */

export function safeError(error: unknown): unknown {
  if (process.env.NODE_ENV !== 'production') {
    return error
  }

  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined
    return code ? { message: error.message, name: error.name, code } : { message: error.message, name: error.name }
  }

  if (typeof error === 'string') {
    return error
  }

  return '[non-Error thrown]'
}

export interface TextShape {
  length: number
  words: number
}

/** Log-safe description of user text: never the text itself. */
export function describeText(text: string): TextShape {
  const trimmed = text.trim()
  return { length: trimmed.length, words: trimmed ? trimmed.split(/\s+/).length : 0 }
}
