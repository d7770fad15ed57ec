import pc from 'picocolors'

export const colors = {
    brand: (text: string) => pc.cyan(pc.bold(text)),
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    dim: (text: string) => pc.dim(text),
    bold: (text: string) => pc.bold(text),
    heading: (text: string) => pc.magenta(pc.bold(text)),
}

export function banner(): string {
    return `${colors.brand('incident-trail')} ${colors.dim('v0.1.0')} - incident diagnosis on Bedrock sessions`
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}

export function formatSuccess(message: string): string {
    return `${colors.success('✓')} ${message}`
}
