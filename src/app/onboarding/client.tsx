'use client'

import { useState } from 'react'
import { Loader2 } from 'lucide-react'
import { toast } from 'sonner'
import { Button } from '@/components/ui/button'
import { Field, Input } from '@/components/ui/input'
import { createBusiness, joinBusiness } from './actions'

export type Invitation = { id: string; businessName: string; roleLabel: string }

export function OnboardingClient({ invitations, suggestedName }: { invitations: Invitation[]; suggestedName: string }) {
  const [pending, setPending] = useState<string | null>(null)

  async function handleCreate(formData: FormData) {
    setPending('create')
    const result = await createBusiness(formData)
    if (!result.ok) {
      toast.error(result.error)
      setPending(null)
      return
    }
    window.location.href = '/'
  }

  async function handleJoin(id: string) {
    setPending(id)
    const result = await joinBusiness(id)
    if (!result.ok) {
      toast.error(result.error)
      setPending(null)
      return
    }
    window.location.href = '/'
  }

  return (
    <div className="mt-6 space-y-8">
      {invitations.length > 0 && (
        <section className="space-y-3">
          <h2 className="text-sm font-semibold uppercase tracking-wide text-slate-500">Invitations</h2>
          {invitations.map((invite) => (
            <div key={invite.id} className="flex items-center justify-between gap-3 rounded-xl border border-[hsl(var(--surface-border))] p-3">
              <div>
                <p className="font-medium">{invite.businessName}</p>
                <p className="text-xs text-slate-500">Join as {invite.roleLabel}</p>
              </div>
              <Button size="sm" onClick={() => handleJoin(invite.id)} disabled={pending !== null}>
                {pending === invite.id && <Loader2 className="h-4 w-4 animate-spin" />}
                Join
              </Button>
            </div>
          ))}
        </section>
      )}

      <form action={handleCreate} className="space-y-4">
        <h2 className="text-sm font-semibold uppercase tracking-wide text-slate-500">New business</h2>
        <Field label="Business name">
          <Input name="business_name" placeholder="Ex: Corner Resale" required />
        </Field>
        <Field label="Your name" hint="Shown to your team.">
          <Input name="display_name" defaultValue={suggestedName} />
        </Field>
        <Button type="submit" className="w-full" disabled={pending !== null}>
          {pending === 'create' && <Loader2 className="h-4 w-4 animate-spin" />}
          Create business
        </Button>
      </form>
    </div>
  )
}
