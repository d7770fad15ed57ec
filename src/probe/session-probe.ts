import { randomUUID } from 'node:crypto'
import { errorMessage } from '../core/errors.js'
import type { SessionGateway, StepSummary } from '../gateway/types.js'
import type { Logger } from '../logger/index.js'

export const PROBE_STAGES = [
    'get-session',
    'create-invocation',
    'put-step',
    'list-invocations',
    'list-steps',
    'get-step',
] as const

export type ProbeStageName = (typeof PROBE_STAGES)[number]
export type ProbeStatus = 'pass' | 'fail' | 'skipped'

export interface ProbeStage {
    name: ProbeStageName
    status: ProbeStatus
    detail: string
}

export interface ProbeReport {
    sessionId: string
    stages: ProbeStage[]
    ok: boolean
}

export const PROBE_DESCRIPTION = 'session probe'
export const PROBE_TEXT = 'Probe step written to check the session-management API.'

class StageFailure extends Error {}

export interface SessionProbeDeps {
    gateway: SessionGateway
    logger: Logger
    now?: () => Date
}

/**
 * Exercises each session-management call in order against one session. Later stages use
 * the ids produced by earlier ones, so the first failure ends the run.
 */
export class SessionProbe {
    private gateway: SessionGateway
    private logger: Logger
    private now: () => Date

    constructor(deps: SessionProbeDeps) {
        this.gateway = deps.gateway
        this.logger = deps.logger
        this.now = deps.now ?? (() => new Date())
    }

    async run(sessionId: string): Promise<ProbeReport> {
        const stages: ProbeStage[] = []
        const gateway = this.gateway
        let invocationId = ''
        let steps: StepSummary[] = []

        const checks: Record<ProbeStageName, () => Promise<string>> = {
            'get-session': async () => {
                const session = await gateway.getSession(sessionId)
                return `session found (status ${session.status})`
            },
            'create-invocation': async () => {
                invocationId = await gateway.createInvocation(sessionId, PROBE_DESCRIPTION)
                return `invocation ${invocationId}`
            },
            'put-step': async () => {
                const stepId = await gateway.putInvocationStep(sessionId, invocationId, randomUUID(), this.now(), [
                    { kind: 'text', text: PROBE_TEXT },
                ])
                return `step ${stepId}`
            },
            'list-invocations': async () => {
                const invocations = await gateway.listInvocations(sessionId)
                return `${invocations.length} invocation(s)`
            },
            'list-steps': async () => {
                steps = await gateway.listInvocationSteps(sessionId, invocationId)
                return `${steps.length} step(s) in ${invocationId}`
            },
            'get-step': async () => {
                if (steps.length === 0) throw new StageFailure('no steps listed to read back')
                for (const step of steps) {
                    await gateway.getInvocationStep(sessionId, invocationId, step.invocationStepId)
                }
                return `${steps.length} step(s) read back`
            },
        }

        let failed = false
        for (const name of PROBE_STAGES) {
            if (failed) {
                stages.push({ name, status: 'skipped', detail: 'skipped after an earlier failure' })
                continue
            }
            try {
                const detail = await checks[name]()
                stages.push({ name, status: 'pass', detail })
                this.logger.debug({ sessionId, stage: name, detail }, 'probe:pass')
            } catch (error) {
                failed = true
                stages.push({ name, status: 'fail', detail: errorMessage(error) })
                this.logger.warn({ sessionId, stage: name, err: errorMessage(error) }, 'Probe stage failed')
            }
        }

        return { sessionId, stages, ok: !failed }
    }
}
