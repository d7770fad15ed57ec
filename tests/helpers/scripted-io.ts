import { stripVTControlCharacters } from 'node:util'
import type { Choice, ShellIO, TextOptions } from '../../src/cli/prompts.js'

export type Answer = string | boolean | null

/** Answers prompts from a fixed script and keeps printed output without colors. */
export class ScriptedIO implements ShellIO {
    readonly printed: string[] = []
    readonly asked: string[] = []
    private answers: Answer[]

    constructor(answers: Answer[]) {
        this.answers = [...answers]
    }

    get remaining(): number {
        return this.answers.length
    }

    async choose<T extends string>(message: string, choices: readonly Choice<T>[]): Promise<T | null> {
        const answer = this.next(message)
        if (answer === null) return null
        const match = choices.find((c) => c.value === answer)
        if (!match) throw new Error(`"${String(answer)}" is not a choice for "${message}"`)
        return match.value
    }

    async text(message: string, _options?: TextOptions): Promise<string | null> {
        const answer = this.next(message)
        if (typeof answer === 'boolean') throw new Error(`Expected text for "${message}"`)
        return answer
    }

    async confirm(message: string): Promise<boolean> {
        const answer = this.next(message)
        if (typeof answer !== 'boolean') throw new Error(`Expected a yes/no answer for "${message}"`)
        return answer
    }

    print(text: string): void {
        this.printed.push(...stripVTControlCharacters(text).split('\n'))
    }

    private next(message: string): Answer {
        this.asked.push(message)
        const answer = this.answers.shift()
        if (answer === undefined) throw new Error(`Script ran out of answers at "${message}"`)
        return answer
    }
}
