/**
 * Wharf CLI — Terminal
 *
 * Everything a command prints or asks goes through a Terminal, so tests can
 * capture output and answer prompts.
 */

import * as readline from 'node:readline/promises'
import { stdin as input, stdout as output } from 'node:process'

export interface Terminal {
  out(line: string): void
  err(line: string): void
  /** Ask a yes/no question; anything but y/yes is a no. */
  confirm(question: string): Promise<boolean>
}

export function isYes(answer: string): boolean {
  const normalized = answer.trim().toLowerCase()
  return normalized === 'y' || normalized === 'yes'
}

export const nodeTerminal: Terminal = {
  out(line: string): void {
    // eslint-disable-next-line no-console
    console.log(line)
  },
  err(line: string): void {
    // eslint-disable-next-line no-console
    console.error(line)
  },
  async confirm(question: string): Promise<boolean> {
    const rl = readline.createInterface({ input, output })
    try {
      return isYes(await rl.question(`${question} [y/N] `))
    } finally {
      rl.close()
    }
  },
}
