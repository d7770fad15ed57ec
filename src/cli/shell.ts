import { SEVERITIES, type Severity } from '../config/schema.js'
import type { Container } from '../core/container.js'
import { errorMessage, RecorderError } from '../core/errors.js'
import { RESOLUTION_TYPES, type ResolutionType } from '../diagnostics/format.js'
import type { Choice, ShellIO } from './prompts.js'
import { renderContext, renderProbeReport } from './render.js'
import { banner, colors, formatError, formatSuccess } from './ui.js'

export type MenuAction = 'create' | 'record' | 'context' | 'end' | 'delete' | 'switch' | 'probe' | 'exit'

export const MENU: readonly Choice<MenuAction>[] = [
    { value: 'create', label: '1. Create new diagnostic session' },
    { value: 'record', label: '2. Record diagnostic step' },
    { value: 'context', label: '3. View full diagnostic context' },
    { value: 'end', label: '4. End diagnostic session' },
    { value: 'delete', label: '5. Delete session' },
    { value: 'switch', label: '6. Switch active session' },
    { value: 'probe', label: '7. Probe session (debug)' },
    { value: 'exit', label: '8. Exit' },
]

function choices<T extends string>(values: readonly T[]): Choice<T>[] {
    return values.map((value) => ({ value, label: value }))
}

export class InteractiveShell {
    private activeSession: string | null = null

    constructor(
        private container: Container,
        private io: ShellIO
    ) {}

    get session(): string | null {
        return this.activeSession
    }

    async run(): Promise<void> {
        this.io.print(banner())
        this.io.print(colors.dim(`Region: ${this.container.config.region}\n`))

        while (true) {
            if (this.activeSession) this.io.print(colors.success(`Active session: ${this.activeSession}`))
            const action = await this.io.choose('Main menu', MENU)
            if (action === null) break
            if (action === 'exit') {
                if (await this.io.confirm('Exit incident-trail?')) break
                continue
            }
            try {
                await this.dispatch(action)
            } catch (error) {
                this.reportError(error)
            }
        }

        this.io.print(colors.dim('Goodbye!'))
    }

    async dispatch(action: Exclude<MenuAction, 'exit'>): Promise<void> {
        switch (action) {
            case 'create':
                return this.createSession()
            case 'record':
                return this.recordStep()
            case 'context':
                return this.viewContext()
            case 'end':
                return this.endSession()
            case 'delete':
                return this.deleteSession()
            case 'switch':
                return this.switchSession()
            case 'probe':
                return this.probeSession()
        }
    }

    private async createSession(): Promise<void> {
        const incidentId = await this.io.text('Incident id', { placeholder: 'INC-1001', required: true })
        if (incidentId === null) return
        const system = await this.io.text('Affected system', { placeholder: 'payment-svc', required: true })
        if (system === null) return
        const severity: Severity | null = await this.io.choose(
            'Severity',
            choices(SEVERITIES),
            this.container.config.defaultSeverity
        )
        if (severity === null) return

        const sessionId = await this.container.lifecycle.open(incidentId, system, severity)
        this.activeSession = sessionId
        this.io.print(formatSuccess(`Diagnostic session created: ${sessionId}`))
    }

    private async recordStep(): Promise<void> {
        if (!this.activeSession) {
            this.io.print(formatError('No active session'))
            return
        }
        const engineerId = await this.io.text('Engineer id', { required: true })
        if (engineerId === null) return
        const component = (await this.io.text('Component analyzed')) ?? ''
        const action = (await this.io.text('Action taken')) ?? ''
        const result = (await this.io.text('Observed result')) ?? ''
        const nextSteps = (await this.io.text('Recommended next steps')) ?? ''

        const screenshots: string[] = []
        if (await this.io.confirm('Attach screenshots?')) {
            while (true) {
                const path = await this.io.text('Image path (empty to finish)')
                if (!path?.trim()) break
                screenshots.push(path.trim())
            }
        }

        const recorded = await this.container.recorder.record(
            this.activeSession,
            engineerId,
            { component, action, result, nextSteps },
            screenshots
        )
        this.io.print(formatSuccess('Diagnostic step recorded'))
        this.io.print(colors.dim(`- Session:    ${this.activeSession}`))
        this.io.print(colors.dim(`- Invocation: ${recorded.invocationId}`))
        this.io.print(colors.dim(`- Step:       ${recorded.stepId}`))
        this.io.print(colors.dim(`- Images:     ${recorded.imageCount}`))
        if (!recorded.verified) this.io.print(colors.warn('The step could not be read back for verification'))
    }

    private async viewContext(): Promise<void> {
        const sessionId = await this.targetSession('Session id to view')
        if (!sessionId) return
        const context = await this.container.reconstructor.reconstruct(sessionId)
        this.io.print(renderContext(context))
    }

    private async endSession(): Promise<void> {
        const sessionId = await this.targetSession('Session id to end')
        if (!sessionId) return
        const type: ResolutionType | null = await this.io.choose('Resolution type', choices(RESOLUTION_TYPES))
        if (type === null) return
        const summary = await this.io.text('Resolution summary', { required: true })
        if (summary === null) return

        await this.container.lifecycle.close(sessionId, summary, type)
        this.io.print(formatSuccess(`Diagnostic session ${sessionId} ended`))
        if (sessionId === this.activeSession && (await this.io.confirm('Clear the active session?'))) {
            this.activeSession = null
            this.io.print(colors.warn("Session ended. Choose 'Create new diagnostic session' to start another."))
        }
    }

    private async deleteSession(): Promise<void> {
        const sessionId = await this.targetSession('Session id to delete')
        if (!sessionId) return
        const reason = await this.io.text('Reason for deletion', { required: true })
        if (reason === null) return
        const approver = await this.io.text('Approver id', { required: true })
        if (approver === null) return

        const outcome = await this.container.lifecycle.delete(sessionId, reason, approver, () =>
            this.io.confirm('Permanently delete this session? This cannot be undone')
        )
        if (!outcome.deleted) {
            this.io.print(colors.warn('Deletion cancelled'))
            return
        }
        if (outcome.audit) this.io.print(colors.warn(`Audit record: ${JSON.stringify(outcome.audit)}`))
        this.io.print(formatSuccess(`Diagnostic session ${sessionId} permanently deleted`))
        if (sessionId === this.activeSession) {
            this.activeSession = null
            this.io.print(colors.warn('The active session was deleted.'))
        }
    }

    private async switchSession(): Promise<void> {
        const sessionId = await this.io.text('New active session id', { required: true })
        if (!sessionId) return
        const session = await this.container.lifecycle.switchTo(sessionId.trim())
        this.activeSession = session.sessionId
        this.io.print(formatSuccess(`Active session switched to ${session.sessionId}`))
    }

    private async probeSession(): Promise<void> {
        const sessionId = await this.targetSession('Session id to probe')
        if (!sessionId) return
        const report = await this.container.probe.run(sessionId)
        this.io.print(renderProbeReport(report))
    }

    private async targetSession(message: string): Promise<string | null> {
        if (this.activeSession) return this.activeSession
        const answer = await this.io.text(message, { required: true })
        return answer?.trim() || null
    }

    private reportError(error: unknown): void {
        const detail = error instanceof RecorderError ? `${errorMessage(error)} (${error.reason})` : errorMessage(error)
        this.io.print(formatError(detail))
        this.container.logger.debug({ err: error }, 'shell:action-failed')
    }
}
