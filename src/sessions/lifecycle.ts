import { randomUUID } from 'node:crypto'
import type { Severity } from '../config/schema.js'
import { ConflictError, ValidationError } from '../core/errors.js'
import { formatResolution, type ResolutionType } from '../diagnostics/format.js'
import { isSessionOpen, type SessionGateway, type SessionRecord } from '../gateway/types.js'
import type { Logger } from '../logger/index.js'
import type { AuditEntry, AuditTrail } from './audit.js'

export const RESOLUTION_DESCRIPTION = 'incident resolution'

export interface SessionLifecycleDeps {
    gateway: SessionGateway
    audit: AuditTrail
    logger: Logger
    tags: Record<string, string>
    now?: () => Date
}

export interface ClosedSession {
    sessionId: string
    invocationId: string
    stepId: string
}

export interface DeleteOutcome {
    deleted: boolean
    audit?: AuditEntry
}

export class SessionLifecycle {
    private gateway: SessionGateway
    private audit: AuditTrail
    private logger: Logger
    private tags: Record<string, string>
    private now: () => Date

    constructor(deps: SessionLifecycleDeps) {
        this.gateway = deps.gateway
        this.audit = deps.audit
        this.logger = deps.logger
        this.tags = deps.tags
        this.now = deps.now ?? (() => new Date())
    }

    async open(incidentId: string, affectedSystem: string, severity: Severity = 'high'): Promise<string> {
        if (!incidentId.trim() || !affectedSystem.trim()) {
            throw new ValidationError('Incident id and affected system are required')
        }
        const metadata = {
            incidentId,
            systemAffected: affectedSystem,
            severity,
            startedAt: this.now().toISOString(),
        }
        const sessionId = await this.gateway.createSession(metadata, { ...this.tags })
        this.logger.info({ sessionId, incidentId }, 'Diagnostic session created')
        return sessionId
    }

    /**
     * Stores the resolution record as a final step and ends the session. A session that is
     * no longer active is rejected before anything is written.
     */
    async close(sessionId: string, resolutionSummary: string, resolutionType: ResolutionType): Promise<ClosedSession> {
        const session = await this.gateway.getSession(sessionId)
        if (!isSessionOpen(session)) {
            throw new ConflictError(`Session ${sessionId} has already ended`)
        }

        const invocationId = await this.gateway.createInvocation(sessionId, RESOLUTION_DESCRIPTION)
        const resolvedAt = this.now()
        const stepId = await this.gateway.putInvocationStep(sessionId, invocationId, randomUUID(), resolvedAt, [
            { kind: 'text', text: formatResolution(resolutionType, resolutionSummary, resolvedAt) },
        ])
        await this.gateway.endSession(sessionId)
        this.logger.info({ sessionId, resolutionType }, 'Diagnostic session ended')
        return { sessionId, invocationId, stepId }
    }

    /**
     * Deletes an existing session once `confirm` agrees. Reason and approver must be non-blank.
     * The audit entry is written before the delete call.
     */
    async delete(
        sessionId: string,
        reason: string,
        approverId: string,
        confirm: () => Promise<boolean>
    ): Promise<DeleteOutcome> {
        if (!reason.trim() || !approverId.trim()) {
            throw new ValidationError('A deletion reason and an approver are required')
        }
        await this.gateway.getSession(sessionId)
        if (!(await confirm())) {
            this.logger.info({ sessionId }, 'Session deletion cancelled')
            return { deleted: false }
        }

        const entry: AuditEntry = {
            action: 'session_deletion',
            sessionId,
            timestamp: this.now().toISOString(),
            reason,
            approver: approverId,
        }
        await this.audit.record(entry)
        await this.gateway.deleteSession(sessionId)
        this.logger.info({ sessionId }, 'Diagnostic session deleted')
        return { deleted: true, audit: entry }
    }

    async switchTo(sessionId: string): Promise<SessionRecord> {
        return this.gateway.getSession(sessionId)
    }
}
