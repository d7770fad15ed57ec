export type ImageFormat = 'png' | 'jpeg' | 'gif' | 'webp'

export type ContentBlock = { kind: 'text'; text: string } | { kind: 'image'; format: ImageFormat; bytes: Uint8Array }

/** A block as read back. Image formats are kept verbatim and bytes may be absent (S3-sourced images). */
export type StoredBlock = { kind: 'text'; text: string } | { kind: 'image'; format: string; bytes?: Uint8Array }

export type SessionStatus = 'active' | 'ended' | 'expired' | 'unknown'

export interface SessionRecord {
    sessionId: string
    sessionArn?: string
    status: SessionStatus
    createdAt?: string
    endedAt?: string
    metadata: Record<string, string>
    /** False when the response carried no metadata container at all. */
    metadataFound: boolean
}

export interface InvocationSummary {
    invocationId: string
    sessionId?: string
    description?: string
    createdAt?: string
}

export interface StepSummary {
    invocationStepId: string
    invocationId: string
    stepTime?: string
}

export interface StepDetail {
    invocationStepId: string
    invocationId: string
    stepTime?: string
    blocks: StoredBlock[]
}

/**
 * The remote session-management API as the rest of the client sees it. Every method
 * returns canonical records and throws errors from `core/errors`.
 */
export interface SessionGateway {
    createSession(metadata: Record<string, string>, tags: Record<string, string>): Promise<string>
    getSession(sessionId: string): Promise<SessionRecord>
    endSession(sessionId: string): Promise<void>
    deleteSession(sessionId: string): Promise<void>
    createInvocation(sessionId: string, description: string): Promise<string>
    listInvocations(sessionId: string): Promise<InvocationSummary[]>
    listInvocationSteps(sessionId: string, invocationId: string): Promise<StepSummary[]>
    getInvocationStep(sessionId: string, invocationId: string, stepId: string): Promise<StepDetail>
    putInvocationStep(
        sessionId: string,
        invocationId: string,
        stepId: string,
        stepTime: Date,
        blocks: ContentBlock[]
    ): Promise<string>
}

export function isSessionOpen(session: SessionRecord): boolean {
    return !session.endedAt && (session.status === 'active' || session.status === 'unknown')
}
