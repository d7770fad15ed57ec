export type IncidentStatus = 'Active' | 'Closed' | 'Unknown'

export interface IncidentInfo {
    incidentId: string
    systemAffected: string
    severity: string
    startedAt: string
    status: IncidentStatus
}

export interface ImageRef {
    stepId: string
    format: string
}

export interface TimelineStep {
    stepId: string
    timestamp: string
    textContent: string
    hasImages: boolean
    imageRefs: ImageRef[]
}

export interface TimelineEntry {
    invocationId: string
    timestamp: string
    description: string
    engineer: string
    steps: TimelineStep[]
}

export interface Hypothesis {
    text: string
    timestamp: string
    engineer: string
}

export interface Screenshot {
    stepId: string
    invocationId: string
    timestamp: string
    associatedText: string
}

/** Read-only projection of a session's history, rebuilt on every query. */
export interface DiagnosticContext {
    sessionId: string
    incidentInfo: IncidentInfo
    diagnosticTimeline: TimelineEntry[]
    componentsTested: string[]
    hypotheses: Hypothesis[]
    screenshots: Screenshot[]
}
