import assert from 'node:assert/strict'
import test from 'node:test'
import { MemoryStore } from '@/test/memory-store'
import { deactivateMember, inviteMember } from './members'

test('inviteMember normalises the email and rejects duplicates', async () => {
  const store = new MemoryStore()
  const member = await inviteMember(store, { email: ' Seller@Example.com ', display_name: 'Sam', role: 'seller' })
  assert.equal(member.email, 'seller@example.com')
  assert.equal(member.is_active, true)
  assert.equal(member.user_id, null)

  await assert.rejects(
    inviteMember(store, { email: 'SELLER@example.com', display_name: 'Sam again', role: 'viewer' }),
    /already on the team/
  )
})

test('inviteMember only hands out non-admin roles', async () => {
  const store = new MemoryStore()
  await assert.rejects(inviteMember(store, { email: 'a@example.com', display_name: 'A', role: 'admin' }), /Choose a role/)
  await assert.rejects(inviteMember(store, { email: 'not-an-email', display_name: 'A', role: 'viewer' }), /Email is not valid/)
})

test('deactivateMember is soft and protects the owner', async () => {
  const store = new MemoryStore()
  const owner = await store.insertMember({ email: 'owner@example.com', display_name: 'Owner', role: 'admin', user_id: 'user-1', is_active: true })
  const stocker = await inviteMember(store, { email: 'stock@example.com', display_name: 'Sol', role: 'stocker' })

  await assert.rejects(deactivateMember(store, owner.id, 'user-1'), /owner cannot be deactivated/)
  await deactivateMember(store, stocker.id, 'user-1')
  assert.equal(store.members.find((m) => m.id === stocker.id)?.is_active, false)
  assert.equal(store.members.length, 2)
})
