/**
 * Error taxonomy for the companion.
 *
 * Only ConfigurationError is allowed to escape to the process level (startup).
 * Everything else is recovered where it is raised: the user never sees a raw
 * internal error, and the worst case they get is the fixed safety payload.
 */

export interface AppErrorOptions {
  code?: string
  cause?: unknown
  context?: Record<string, unknown>
}

export class AppError extends Error {
  readonly code: string
  readonly context?: Record<string, unknown>

  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, { cause: options.cause })
    this.name = this.constructor.name
    this.code = options.code ?? 'INTERNAL_ERROR'
    this.context = options.context
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.context ? { context: this.context } : {}),
    }
  }
}

/** Text that cannot be classified. Recovered as an empty signal set. */
export class ClassificationInputError extends AppError {
  constructor(message = 'Unclassifiable input', options: AppErrorOptions = {}) {
    super(message, { ...options, code: options.code ?? 'CLASSIFICATION_INPUT' })
  }
}

/** Conversation state could not be read or committed. The message fails closed. */
export class StateStoreUnavailable extends AppError {
  constructor(message = 'State store unavailable', options: AppErrorOptions = {}) {
    super(message, { ...options, code: options.code ?? 'STATE_STORE_UNAVAILABLE' })
  }
}

/** Every generative provider failed. Recovered with a static supportive reply. */
export class GenerativeBackendError extends AppError {
  constructor(message = 'Generative backend failed', options: AppErrorOptions = {}) {
    super(message, { ...options, code: options.code ?? 'GENERATIVE_BACKEND' })
  }
}

/** Lexicon, thresholds or resources missing or invalid. Fatal at startup. */
export class ConfigurationError extends AppError {
  constructor(message = 'Invalid configuration', options: AppErrorOptions = {}) {
    super(message, { ...options, code: options.code ?? 'CONFIGURATION' })
  }
}

export class MoodValidationError extends AppError {
  constructor(message = 'Invalid mood entry', options: AppErrorOptions = {}) {
    super(message, { ...options, code: options.code ?? 'MOOD_VALIDATION' })
  }
}
