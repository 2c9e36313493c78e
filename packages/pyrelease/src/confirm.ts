import type { Confirmer } from './types'
import { prompt } from './utils'

/**
 * Only a single `y` (any case) counts as yes
 */
export function isAffirmative(answer: string): boolean {
  return answer.trim().toLowerCase() === 'y'
}

/**
 * Ask on the terminal, `(y/N)` style
 */
export function createPromptConfirmer(ask: (question: string) => Promise<string> = prompt): Confirmer {
  return {
    async confirm(question: string): Promise<boolean> {
      const answer = await ask(`${question} (y/N):`)
      return isAffirmative(answer)
    },
  }
}

/**
 * Answers yes at every gate without asking. Unlike `confirm: false`
 * (what `--yes` sets), the pre-upload reminders are still printed.
 */
export const autoConfirmer: Confirmer = {
  confirm: () => Promise.resolve(true),
}
