import { errorMessage, NotFoundError } from '../core/errors.js'
import type { InvocationSummary, SessionGateway, SessionRecord, StepDetail, StepSummary } from '../gateway/types.js'
import type { Logger } from '../logger/index.js'
import { MarkerAnnotator, type TextAnnotator, UNKNOWN } from './annotations.js'
import type {
    DiagnosticContext,
    Hypothesis,
    ImageRef,
    IncidentInfo,
    Screenshot,
    TimelineEntry,
    TimelineStep,
} from './types.js'

const ASSOCIATED_TEXT_LIMIT = 100
const ENGINEER_SEPARATOR = /\s(?:by|por)\s/

export interface ContextReconstructorDeps {
    gateway: SessionGateway
    logger: Logger
    annotator?: TextAnnotator
}

interface Collected {
    components: Set<string>
    hypotheses: Hypothesis[]
    screenshots: Screenshot[]
}

function compareTimestamps(a: string, b: string): number {
    if (a < b) return -1
    if (a > b) return 1
    return 0
}

/** Stable ascending sort on a timestamp string; missing timestamps sort first. */
export function sortByTimestamp<T>(items: readonly T[], timestampOf: (item: T) => string | undefined): T[] {
    return [...items].sort((a, b) => compareTimestamps(timestampOf(a) ?? '', timestampOf(b) ?? ''))
}

export function engineerFromDescription(description: string): string {
    const match = ENGINEER_SEPARATOR.exec(description)
    if (!match) return UNKNOWN
    const engineer = description.slice(match.index + match[0].length).trim()
    return engineer || UNKNOWN
}

export function truncate(text: string, limit: number): string {
    return text.length > limit ? `${text.slice(0, limit)}...` : text
}

export function incidentInfoFrom(session: SessionRecord): IncidentInfo {
    const { metadata } = session
    const closed = Boolean(session.endedAt) || session.status === 'ended' || session.status === 'expired'
    return {
        incidentId: metadata.incidentId ?? UNKNOWN,
        systemAffected: metadata.systemAffected ?? UNKNOWN,
        severity: metadata.severity ?? UNKNOWN,
        startedAt: session.createdAt ?? metadata.startedAt ?? UNKNOWN,
        status: closed ? 'Closed' : 'Active',
    }
}

/**
 * Rebuilds the diagnostic narrative of a session from its invocations and steps.
 *
 * Only an unknown session is an error. Any other failure (a listing that cannot be read,
 * a step without content blocks) is logged and leaves the affected part empty.
 */
export class ContextReconstructor {
    private gateway: SessionGateway
    private logger: Logger
    private annotator: TextAnnotator

    constructor(deps: ContextReconstructorDeps) {
        this.gateway = deps.gateway
        this.logger = deps.logger
        this.annotator = deps.annotator ?? new MarkerAnnotator()
    }

    async reconstruct(sessionId: string): Promise<DiagnosticContext> {
        const incidentInfo = await this.readIncident(sessionId)
        const collected: Collected = { components: new Set(), hypotheses: [], screenshots: [] }
        const timeline: TimelineEntry[] = []

        for (const invocation of await this.readInvocations(sessionId)) {
            const description = invocation.description ?? `Invocation ${invocation.invocationId}`
            timeline.push({
                invocationId: invocation.invocationId,
                timestamp: invocation.createdAt ?? '',
                description,
                engineer: engineerFromDescription(description),
                steps: await this.readSteps(sessionId, invocation.invocationId, collected),
            })
        }

        const context: DiagnosticContext = {
            sessionId,
            incidentInfo,
            diagnosticTimeline: sortByTimestamp(timeline, (e) => e.timestamp),
            componentsTested: [...collected.components],
            hypotheses: sortByTimestamp(collected.hypotheses, (h) => h.timestamp),
            screenshots: sortByTimestamp(collected.screenshots, (s) => s.timestamp),
        }

        this.logger.debug(
            {
                sessionId,
                timeline: context.diagnosticTimeline.length,
                components: context.componentsTested.length,
                hypotheses: context.hypotheses.length,
                screenshots: context.screenshots.length,
            },
            'context:reconstructed'
        )
        return context
    }

    private async readIncident(sessionId: string): Promise<IncidentInfo> {
        let session: SessionRecord
        try {
            session = await this.gateway.getSession(sessionId)
        } catch (error) {
            if (error instanceof NotFoundError) throw error
            this.logger.warn({ sessionId, err: errorMessage(error) }, 'Session details unavailable')
            return {
                incidentId: UNKNOWN,
                systemAffected: UNKNOWN,
                severity: UNKNOWN,
                startedAt: UNKNOWN,
                status: 'Unknown',
            }
        }

        if (!session.metadataFound) {
            this.logger.warn({ sessionId }, 'Session has no metadata')
        }
        return incidentInfoFrom(session)
    }

    private async readInvocations(sessionId: string): Promise<InvocationSummary[]> {
        try {
            const invocations = await this.gateway.listInvocations(sessionId)
            return sortByTimestamp(invocations, (i) => i.createdAt)
        } catch (error) {
            this.logger.warn({ sessionId, err: errorMessage(error) }, 'Could not list invocations')
            return []
        }
    }

    private async readSteps(sessionId: string, invocationId: string, collected: Collected): Promise<TimelineStep[]> {
        let summaries: StepSummary[]
        try {
            summaries = sortByTimestamp(
                await this.gateway.listInvocationSteps(sessionId, invocationId),
                (s) => s.stepTime
            )
        } catch (error) {
            this.logger.warn({ sessionId, invocationId, err: errorMessage(error) }, 'Could not list invocation steps')
            return []
        }

        const steps: TimelineStep[] = []
        for (const summary of summaries) {
            const step = await this.readStep(sessionId, invocationId, summary, collected)
            if (step) steps.push(step)
        }
        return steps
    }

    private async readStep(
        sessionId: string,
        invocationId: string,
        summary: StepSummary,
        collected: Collected
    ): Promise<TimelineStep | null> {
        const stepId = summary.invocationStepId
        let detail: StepDetail
        try {
            detail = await this.gateway.getInvocationStep(sessionId, invocationId, stepId)
        } catch (error) {
            this.logger.warn({ sessionId, invocationId, stepId, err: errorMessage(error) }, 'Skipping unreadable step')
            return null
        }

        const timestamp = detail.stepTime ?? summary.stepTime ?? ''
        let textContent = ''
        const imageRefs: ImageRef[] = []

        for (const block of detail.blocks) {
            if (block.kind === 'text') {
                textContent = block.text
                const annotations = this.annotator.extract(block.text)
                for (const component of annotations.components) {
                    if (!collected.components.has(component)) {
                        this.logger.debug({ stepId, component }, 'context:component')
                    }
                    collected.components.add(component)
                }
                for (const note of annotations.hypotheses) {
                    collected.hypotheses.push({ text: note.text, timestamp, engineer: note.engineer })
                }
            } else {
                imageRefs.push({ stepId, format: block.format })
                collected.screenshots.push({
                    stepId,
                    invocationId,
                    timestamp,
                    associatedText: truncate(textContent, ASSOCIATED_TEXT_LIMIT),
                })
            }
        }

        return { stepId, timestamp, textContent, hasImages: imageRefs.length > 0, imageRefs }
    }
}
