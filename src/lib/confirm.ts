import * as readline from 'node:readline/promises'

/** 破壊的な書き込みの前に yes/no を確認する */
export interface ConfirmationGate {
  confirm(question: string): Promise<boolean>
}

/** node:readline/promises の Interface を満たす最小限の入力元 */
export interface Prompter {
  question(query: string): Promise<string>
}

/** yes か no が返るまで聞き直す */
export class PromptConfirmationGate implements ConfirmationGate {
  constructor(private readonly prompter: Prompter) {}

  async confirm(question: string): Promise<boolean> {
    while (true) {
      const answer = (await this.prompter.question(`${question} (yes/no): `)).trim().toLowerCase()
      if (answer === 'yes') return true
      if (answer === 'no') return false
    }
  }
}

/** 端末がない場合用。常に固定の回答を返す */
export class AutoConfirmationGate implements ConfirmationGate {
  constructor(private readonly answer: boolean) {}

  async confirm(_question: string): Promise<boolean> {
    return this.answer
  }
}

export interface ConfirmationSession {
  readonly gate: ConfirmationGate
  close(): void
}

/** 入力が端末なら readline で確認し、端末でなければ常に no と答える */
export function openConfirmationSession(
  input: NodeJS.ReadableStream & { readonly isTTY?: boolean },
  output: NodeJS.WritableStream
): ConfirmationSession {
  if (!input.isTTY) {
    return { gate: new AutoConfirmationGate(false), close: () => undefined }
  }
  const rl = readline.createInterface({ input, output })
  return { gate: new PromptConfirmationGate(rl), close: () => rl.close() }
}
