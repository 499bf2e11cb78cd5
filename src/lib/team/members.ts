import type { ResaleStore } from '@/lib/db/store'
import type { BusinessMember, Role } from '@/lib/db/types'
import { ValidationError } from '@/lib/errors'
import { EMAIL_REGEX, requireText } from '@/lib/validation'

/** Roles an admin can hand out; the owner is the only admin. */
export const INVITABLE_ROLES: Role[] = ['seller', 'viewer', 'stocker']

export async function inviteMember(
  store: ResaleStore,
  input: { email: unknown; display_name: unknown; role: unknown }
): Promise<BusinessMember> {
  const displayName = requireText(input.display_name, 'Name')
  const email = requireText(input.email, 'Email').toLowerCase()
  if (!EMAIL_REGEX.test(email)) throw new ValidationError('Email is not valid')
  const role = INVITABLE_ROLES.find((r) => r === input.role)
  if (!role) throw new ValidationError('Choose a role')

  const members = await store.listMembers()
  if (members.some((m) => m.email.toLowerCase() === email)) {
    throw new ValidationError('That email is already on the team')
  }
  return store.insertMember({ email, display_name: displayName, role, user_id: null, is_active: true })
}

export async function deactivateMember(store: ResaleStore, memberId: string, currentUserId: string) {
  const members = await store.listMembers()
  const member = members.find((m) => m.id === memberId)
  if (!member) throw new ValidationError('Member not found')
  if (member.user_id === currentUserId || member.role === 'admin') {
    throw new ValidationError('The owner cannot be deactivated')
  }
  await store.updateMember(memberId, { is_active: false })
}

export async function reactivateMember(store: ResaleStore, memberId: string) {
  await store.updateMember(memberId, { is_active: true })
}
