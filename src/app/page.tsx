import { redirect } from 'next/navigation'
import { requireProfile } from '@/lib/auth'
import { linksForRole } from '@/config/nav'

export default async function Home() {
  const profile = await requireProfile()
  const [first] = linksForRole(profile.role)
  redirect(first ? first.href : '/login')
}
