import type { DiagnosticContext } from '../context/types.js'
import type { ProbeReport } from '../probe/session-probe.js'
import { colors } from './ui.js'

const PREVIEW_LIMIT = 50

function preview(text: string): string {
    const flat = text.replace(/\s+/g, ' ').trim()
    return flat.length > PREVIEW_LIMIT ? `${flat.slice(0, PREVIEW_LIMIT)}...` : flat
}

/** `2025-03-01T10:15:30.000Z` becomes `2025-03-01 10:15:30`. Non-ISO values pass through. */
export function formatDateTime(timestamp: string): string {
    if (!timestamp) return 'Unknown'
    return timestamp.includes('T') ? timestamp.replace('T', ' ').slice(0, 19) : timestamp
}

export function formatTime(timestamp: string): string {
    if (timestamp.includes('T')) return (timestamp.split('T')[1] ?? '').slice(0, 8)
    if (timestamp.includes(' ')) return (timestamp.split(' ')[1] ?? '').slice(0, 8)
    return timestamp.slice(0, 8)
}

export function renderContext(context: DiagnosticContext): string {
    const { incidentInfo: info } = context
    const lines: string[] = []

    lines.push(colors.heading('DIAGNOSTIC SUMMARY'), '')
    lines.push(colors.bold('Incident'))
    lines.push(`  ID:       ${info.incidentId}`)
    lines.push(`  System:   ${info.systemAffected}`)
    lines.push(`  Severity: ${info.severity}`)
    lines.push(`  Started:  ${formatDateTime(info.startedAt)}`)
    lines.push(`  Status:   ${info.status}`, '')

    lines.push(colors.bold('Components analyzed'))
    lines.push(`  ${context.componentsTested.length > 0 ? context.componentsTested.join(', ') : 'None'}`, '')

    if (context.hypotheses.length > 0) {
        lines.push(colors.bold('Hypotheses'))
        for (const h of context.hypotheses) {
            lines.push(`  ${formatDateTime(h.timestamp)} | ${h.engineer} | ${preview(h.text)}`)
        }
        lines.push('')
    }

    lines.push(colors.heading('DIAGNOSTIC TIMELINE'))
    if (context.diagnosticTimeline.length === 0) {
        lines.push(colors.warn('  No events in the timeline'))
    }
    context.diagnosticTimeline.forEach((event, i) => {
        lines.push(`${colors.bold(`${i + 1}. ${formatDateTime(event.timestamp)}`)} - ${event.description} (Engineer: ${event.engineer})`)
        if (event.steps.length === 0) {
            lines.push(colors.dim('   └─ No recorded steps for this event'))
            return
        }
        lines.push(colors.dim(`   └─ ${event.steps.length} step(s) recorded`))
        event.steps.forEach((step, j) => {
            const marker = step.hasImages ? '[img]' : '[txt]'
            lines.push(`      ${j + 1}. ${marker} ${colors.dim(formatTime(step.timestamp))} - ${preview(step.textContent)}`)
        })
    })

    lines.push('')
    if (context.screenshots.length > 0) {
        lines.push(colors.heading(`${context.screenshots.length} SCREENSHOT(S) AVAILABLE`))
        context.screenshots.forEach((shot, i) => {
            lines.push(`   ${i + 1}. ${colors.dim(formatDateTime(shot.timestamp))} - ${shot.associatedText}`)
        })
    } else {
        lines.push(colors.dim('No screenshots recorded'))
    }

    return lines.join('\n')
}

const STAGE_ICONS = {
    pass: colors.success('✓'),
    fail: colors.error('✗'),
    skipped: colors.dim('-'),
} as const

export function renderProbeReport(report: ProbeReport): string {
    const lines = [colors.heading(`Session probe: ${report.sessionId}`)]
    report.stages.forEach((stage, i) => {
        lines.push(`  ${STAGE_ICONS[stage.status]} ${i + 1}. ${stage.name.padEnd(18)} ${stage.detail}`)
    })
    lines.push('')
    lines.push(report.ok ? colors.success('All stages passed') : colors.warn('Probe stopped at the first failing stage'))
    return lines.join('\n')
}
