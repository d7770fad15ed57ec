import * as clack from '@clack/prompts'

export interface Choice<T extends string> {
    value: T
    label: string
    hint?: string
}

export interface TextOptions {
    placeholder?: string
    required?: boolean
}

/** Everything the interactive shell needs from the terminal. */
export interface ShellIO {
    choose<T extends string>(message: string, choices: readonly Choice<T>[], initial?: T): Promise<T | null>
    text(message: string, options?: TextOptions): Promise<string | null>
    confirm(message: string): Promise<boolean>
    print(text: string): void
}

export const clackIO: ShellIO = {
    async choose<T extends string>(message: string, choices: readonly Choice<T>[], initial?: T): Promise<T | null> {
        const result = await clack.select<string>({
            message,
            options: choices.map((c) => ({ value: c.value, label: c.label, hint: c.hint })),
            initialValue: initial,
        })
        if (clack.isCancel(result)) return null
        return choices.find((c) => c.value === result)?.value ?? null
    },

    async text(message: string, options: TextOptions = {}): Promise<string | null> {
        const result = await clack.text({
            message,
            placeholder: options.placeholder,
            validate: options.required ? (value) => (value?.trim() ? undefined : 'A value is required') : undefined,
        })
        if (clack.isCancel(result)) return null
        return result
    },

    async confirm(message: string): Promise<boolean> {
        const result = await clack.confirm({ message })
        if (clack.isCancel(result)) return false
        return result
    },

    print(text: string): void {
        console.log(text)
    },
}
