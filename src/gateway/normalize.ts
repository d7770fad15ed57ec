import { z } from 'zod'
import { MalformedResponseError } from '../core/errors.js'
import type {
    InvocationSummary,
    SessionRecord,
    SessionStatus,
    StepDetail,
    StepSummary,
    StoredBlock,
} from './types.js'

// Every raw response passes through here once. The rest of the client only sees the
// canonical records from ./types.

const Timestamp = z
    .union([z.date(), z.string(), z.number()])
    .transform((value) => (typeof value === 'string' ? value : new Date(value).toISOString()))

const StringMap = z.record(z.unknown()).transform((values) => {
    const out: Record<string, string> = {}
    for (const [key, value] of Object.entries(values)) {
        if (value === undefined || value === null) continue
        out[key] = typeof value === 'string' ? value : JSON.stringify(value)
    }
    return out
})

const SessionShape = z.object({
    sessionId: z.string().nullish(),
    sessionArn: z.string().nullish(),
    sessionStatus: z.string().nullish(),
    createdAt: Timestamp.nullish(),
    creationDateTime: Timestamp.nullish(),
    endDateTime: Timestamp.nullish(),
    endedAt: Timestamp.nullish(),
    sessionMetadata: StringMap.nullish(),
    metadata: StringMap.nullish(),
})

const InvocationShape = z.object({
    invocationId: z.string().min(1),
    sessionId: z.string().nullish(),
    description: z.string().nullish(),
    createdAt: Timestamp.nullish(),
})

const StepSummaryShape = z.object({
    invocationStepId: z.string().min(1),
    invocationId: z.string().nullish(),
    invocationStepTime: Timestamp.nullish(),
})

const ListShape = z.object({ nextToken: z.string().nullish() }).passthrough()

const StepShape = z.object({
    invocationStepId: z.string().nullish(),
    invocationId: z.string().nullish(),
    invocationStepTime: Timestamp.nullish(),
    payload: z.object({ contentBlocks: z.array(z.unknown()) }),
})

const TextBlockShape = z.object({ text: z.string() })
const ImageBlockShape = z.object({
    image: z.object({
        format: z.string().nullish(),
        source: z.object({ bytes: z.instanceof(Uint8Array).nullish() }).passthrough().nullish(),
    }),
})

export interface Page<T> {
    items: T[]
    nextToken?: string
    /** Response field the items were read from, `null` when neither known field was present. */
    field: string | null
    /** Items that did not match the expected shape. */
    dropped: number
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function unwrap(raw: unknown, key: string): unknown {
    if (isRecord(raw) && isRecord(raw[key])) return raw[key]
    return raw
}

function describeIssues(error: z.ZodError): string {
    return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
}

const STATUS_MAP: Record<string, SessionStatus> = {
    ACTIVE: 'active',
    ENDED: 'ended',
    EXPIRED: 'expired',
}

export function normalizeSession(raw: unknown, requestedId: string): SessionRecord {
    const parsed = SessionShape.safeParse(unwrap(raw, 'session'))
    if (!parsed.success) {
        throw new MalformedResponseError(`Unexpected session response: ${describeIssues(parsed.error)}`)
    }
    const data = parsed.data
    const endedAt = data.endDateTime ?? data.endedAt ?? undefined
    let status = STATUS_MAP[(data.sessionStatus ?? '').toUpperCase()] ?? 'unknown'
    if (status === 'unknown' && endedAt) status = 'ended'

    const metadata = data.sessionMetadata ?? data.metadata

    return {
        sessionId: data.sessionId ?? requestedId,
        sessionArn: data.sessionArn ?? undefined,
        status,
        createdAt: data.createdAt ?? data.creationDateTime ?? undefined,
        endedAt,
        metadata: metadata ?? {},
        metadataFound: metadata !== undefined && metadata !== null,
    }
}

function normalizeList<T>(
    raw: unknown,
    fields: readonly string[],
    parseItem: (item: unknown) => T | null
): Page<T> {
    const parsed = ListShape.safeParse(raw)
    if (!parsed.success) {
        throw new MalformedResponseError(`Unexpected listing response: ${describeIssues(parsed.error)}`)
    }
    const body: Record<string, unknown> = parsed.data
    const field = fields.find((name) => Array.isArray(body[name])) ?? null
    const rawItems = field ? body[field] : []
    const items: T[] = []
    let dropped = 0
    for (const item of Array.isArray(rawItems) ? rawItems : []) {
        const value = parseItem(item)
        if (value === null) dropped++
        else items.push(value)
    }
    return { items, nextToken: parsed.data.nextToken ?? undefined, field, dropped }
}

// Both field names have been observed for this listing; neither is treated as authoritative.
export const INVOCATION_LIST_FIELDS = ['invocationSummaries', 'invocations'] as const
export const STEP_LIST_FIELDS = ['invocationStepSummaries', 'invocationSteps'] as const

export function normalizeInvocationPage(raw: unknown): Page<InvocationSummary> {
    return normalizeList(raw, INVOCATION_LIST_FIELDS, (item) => {
        const parsed = InvocationShape.safeParse(item)
        if (!parsed.success) return null
        return {
            invocationId: parsed.data.invocationId,
            sessionId: parsed.data.sessionId ?? undefined,
            description: parsed.data.description ?? undefined,
            createdAt: parsed.data.createdAt ?? undefined,
        }
    })
}

export function normalizeStepPage(raw: unknown, invocationId: string): Page<StepSummary> {
    return normalizeList(raw, STEP_LIST_FIELDS, (item) => {
        const parsed = StepSummaryShape.safeParse(item)
        if (!parsed.success) return null
        return {
            invocationStepId: parsed.data.invocationStepId,
            invocationId: parsed.data.invocationId ?? invocationId,
            stepTime: parsed.data.invocationStepTime ?? undefined,
        }
    })
}

export function normalizeBlock(raw: unknown): StoredBlock | null {
    const text = TextBlockShape.safeParse(raw)
    if (text.success) return { kind: 'text', text: text.data.text }
    const image = ImageBlockShape.safeParse(raw)
    if (image.success) {
        return {
            kind: 'image',
            format: image.data.image.format ?? 'unknown',
            bytes: image.data.image.source?.bytes ?? undefined,
        }
    }
    return null
}

export function normalizeStepDetail(raw: unknown, invocationId: string, stepId: string): StepDetail {
    const parsed = StepShape.safeParse(unwrap(raw, 'invocationStep'))
    if (!parsed.success) {
        throw new MalformedResponseError(`Step ${stepId} has no payload content blocks: ${describeIssues(parsed.error)}`)
    }
    const blocks: StoredBlock[] = []
    for (const rawBlock of parsed.data.payload.contentBlocks) {
        const block = normalizeBlock(rawBlock)
        if (block) blocks.push(block)
    }
    return {
        invocationStepId: parsed.data.invocationStepId ?? stepId,
        invocationId: parsed.data.invocationId ?? invocationId,
        stepTime: parsed.data.invocationStepTime ?? undefined,
        blocks,
    }
}

export function requireInvocationId(raw: unknown): string {
    const parsed = z.object({ invocationId: z.string().min(1) }).safeParse(raw)
    if (!parsed.success) {
        throw new MalformedResponseError('Create-invocation response contains no invocationId')
    }
    return parsed.data.invocationId
}

export function requireSessionId(raw: unknown): string {
    const parsed = z.object({ sessionId: z.string().min(1) }).safeParse(raw)
    if (!parsed.success) {
        throw new MalformedResponseError('Create-session response contains no sessionId')
    }
    return parsed.data.sessionId
}
