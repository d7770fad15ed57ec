export interface DiagnosticData {
    component: string
    action: string
    result: string
    nextSteps: string
}

export type ResolutionType = 'fix' | 'workaround' | 'escalation'

export const RESOLUTION_TYPES: readonly ResolutionType[] = ['fix', 'workaround', 'escalation']

/** Written for an empty component or action. */
export const NOT_SPECIFIED = 'Not specified'

function orDefault(value: string, fallback: string): string {
    return value.trim() ? value : fallback
}

export function formatDiagnosticStep(engineerId: string, data: DiagnosticData): string {
    return [
        '## Diagnostic step',
        '',
        `**Engineer:** ${engineerId}`,
        `**Component:** ${orDefault(data.component, NOT_SPECIFIED)}`,
        `**Action taken:** ${orDefault(data.action, NOT_SPECIFIED)}`,
        '',
        '**Observed result:**',
        orDefault(data.result, 'Not documented'),
        '',
        '**Recommended next steps:**',
        orDefault(data.nextSteps, 'Not defined'),
    ].join('\n')
}

export function formatResolution(type: ResolutionType, summary: string, resolvedAt: Date): string {
    return [
        '## Incident resolution',
        '',
        `**Resolution type:** ${type}`,
        '',
        '**Summary:**',
        summary,
        '',
        `**Resolved at:** ${resolvedAt.toISOString()}`,
        '',
        '**Lessons learned:**',
        '- [To be completed in the post-incident review]',
    ].join('\n')
}

export function invocationDescription(component: string, engineerId: string): string {
    return `diagnosis of ${component.trim() || 'unknown system'} by ${engineerId}`
}
