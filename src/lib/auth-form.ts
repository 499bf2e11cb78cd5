import { EMAIL_REGEX } from '@/lib/validation'

export const MIN_PASSWORD_LENGTH = 6

/** Client-side checks before calling Supabase Auth; returns the first problem or null. */
export function checkCredentials(input: { email: string; password: string; displayName?: string }, signUp: boolean): string | null {
  if (!EMAIL_REGEX.test(input.email.trim())) return 'Enter a valid email address'
  if (input.password.length < MIN_PASSWORD_LENGTH) return `Password must be at least ${MIN_PASSWORD_LENGTH} characters`
  if (signUp && !input.displayName?.trim()) return 'Enter your name'
  return null
}
