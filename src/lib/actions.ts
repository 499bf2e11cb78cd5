import { revalidatePath } from 'next/cache'
import { toUserMessage, type ActionResult } from '@/lib/errors'

type ActionOptions = {
  /** Prefix for the server log line, e.g. "createCategory". */
  name: string
  /** Record name used in constraint messages ("Category already exists"). */
  subject?: string
  revalidate: string[]
}

/**
 * Shared shape of the screens' server actions: run the mutation, refresh the
 * affected pages, and turn any failure into `{ ok: false, error }`.
 */
export async function runAction(options: ActionOptions, mutate: () => Promise<string | void>): Promise<ActionResult> {
  try {
    const message = await mutate()
    options.revalidate.forEach((path) => revalidatePath(path))
    return message ? { ok: true, message } : { ok: true }
  } catch (e) {
    console.error(`${options.name} error:`, e)
    return { ok: false, error: toUserMessage(e, options.subject) }
  }
}
