/**
 * Interactive field prompting for `specgen create --interactive`.
 */

import { createInterface } from 'node:readline'
import type { FieldInput } from '../../modules/spec-builder/types.js'

/** Asks one question and resolves with the trimmed answer ('' on EOF) */
export interface Prompter {
  ask(question: string): Promise<string>
  close(): void
}

/**
 * Prompter reading answers from stdin, one line per question.
 */
export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  const rl = createInterface({ input, output })
  let closed = false
  rl.on('close', () => {
    closed = true
  })

  return {
    ask(question: string): Promise<string> {
      if (closed) return Promise.resolve('')
      return new Promise<string>((resolve) => {
        const onClose = (): void => resolve('')
        rl.once('close', onClose)
        rl.question(question, (answer) => {
          rl.off('close', onClose)
          resolve(answer.trim())
        })
      })
    },
    close(): void {
      rl.close()
    },
  }
}

interface PromptField {
  key: keyof FieldInput
  label: string
  required: boolean
}

/** Fields asked for, in order */
export const PROMPT_FIELDS: readonly PromptField[] = [
  { key: 'module', label: 'Module name', required: true },
  { key: 'spec_type', label: 'Spec type', required: true },
  { key: 'version', label: 'Version', required: true },
  { key: 'summary', label: 'Summary', required: false },
  { key: 'license', label: 'License', required: false },
  { key: 'url', label: 'URL', required: false },
  { key: 'description', label: 'Description', required: false },
]

/** Attempts per required field before giving up and leaving it empty */
const MAX_ATTEMPTS = 3

/**
 * Ask for every field of PROMPT_FIELDS that `input` leaves unset.
 * Required fields are asked again while the answer is empty.
 */
export async function promptForMissingFields(
  input: Partial<FieldInput>,
  prompter: Prompter
): Promise<Partial<FieldInput>> {
  const result: Partial<FieldInput> = { ...input }

  for (const field of PROMPT_FIELDS) {
    const current = result[field.key]
    if (current !== undefined && current !== '') continue

    let answer = ''
    const attempts = field.required ? MAX_ATTEMPTS : 1
    for (let i = 0; i < attempts && answer === ''; i++) {
      answer = await prompter.ask(`${field.label}: `)
    }
    if (answer !== '') result[field.key] = answer
  }

  return result
}
