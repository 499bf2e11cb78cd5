export class ValidationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

export class PermissionError extends Error {
  readonly permission: string

  constructor(permission: string) {
    super('You do not have permission to do that.')
    this.name = 'PermissionError'
    this.permission = permission
  }
}

/** Error raised by the data layer when PostgREST returns an error object. */
export class StoreError extends Error {
  readonly code: string

  constructor(code: string, message: string) {
    super(message)
    this.name = 'StoreError'
    this.code = code
  }
}

function errorCode(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return String(error.code ?? '')
  }
  return ''
}

export function isUniqueViolation(error: unknown): boolean {
  return errorCode(error) === '23505'
}

export function isForeignKeyViolation(error: unknown): boolean {
  return errorCode(error) === '23503'
}

export const GENERIC_ERROR_MESSAGE = 'Something went wrong. Please try again.'

/**
 * Message shown to the user for a failed mutation. `subject` names the
 * record ("Category", "Supplier") for the constraint messages. Only our own
 * validation and permission messages are shown as written; database and
 * driver errors stay in the server log.
 */
export function toUserMessage(error: unknown, subject = 'Record'): string {
  if (error instanceof ValidationError || error instanceof PermissionError) return error.message
  if (isUniqueViolation(error)) return `${subject} already exists`
  if (isForeignKeyViolation(error)) return `${subject} is still in use`
  return GENERIC_ERROR_MESSAGE
}

export type ActionResult = { ok: true; message?: string } | { ok: false; error: string }

export type ActionResultWith<T> = { ok: true; data: T; message?: string } | { ok: false; error: string }
