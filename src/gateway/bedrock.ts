import {
    BedrockAgentRuntimeClient,
    type BedrockSessionContentBlock,
    CreateInvocationCommand,
    CreateSessionCommand,
    DeleteSessionCommand,
    EndSessionCommand,
    GetInvocationStepCommand,
    GetSessionCommand,
    ListInvocationStepsCommand,
    ListInvocationsCommand,
    PutInvocationStepCommand,
} from '@aws-sdk/client-bedrock-agent-runtime'
import type { ResolvedConfig } from '../config/schema.js'
import { classifyGatewayError } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import {
    normalizeInvocationPage,
    normalizeSession,
    normalizeStepDetail,
    normalizeStepPage,
    type Page,
    requireInvocationId,
    requireSessionId,
} from './normalize.js'
import type {
    ContentBlock,
    InvocationSummary,
    SessionGateway,
    SessionRecord,
    StepDetail,
    StepSummary,
} from './types.js'

export function toSdkBlock(block: ContentBlock): BedrockSessionContentBlock {
    if (block.kind === 'text') return { text: block.text }
    return { image: { format: block.format, source: { bytes: block.bytes } } }
}

export class BedrockSessionGateway implements SessionGateway {
    constructor(
        private client: BedrockAgentRuntimeClient,
        private logger: Logger
    ) {}

    async createSession(metadata: Record<string, string>, tags: Record<string, string>): Promise<string> {
        const output = await this.call('CreateSession', () =>
            this.client.send(new CreateSessionCommand({ sessionMetadata: metadata, tags }))
        )
        return requireSessionId(output)
    }

    async getSession(sessionId: string): Promise<SessionRecord> {
        const output = await this.call('GetSession', () =>
            this.client.send(new GetSessionCommand({ sessionIdentifier: sessionId }))
        )
        return normalizeSession(output, sessionId)
    }

    async endSession(sessionId: string): Promise<void> {
        await this.call('EndSession', () => this.client.send(new EndSessionCommand({ sessionIdentifier: sessionId })))
    }

    async deleteSession(sessionId: string): Promise<void> {
        await this.call('DeleteSession', () =>
            this.client.send(new DeleteSessionCommand({ sessionIdentifier: sessionId }))
        )
    }

    async createInvocation(sessionId: string, description: string): Promise<string> {
        const output = await this.call('CreateInvocation', () =>
            this.client.send(new CreateInvocationCommand({ sessionIdentifier: sessionId, description }))
        )
        return requireInvocationId(output)
    }

    async listInvocations(sessionId: string): Promise<InvocationSummary[]> {
        const items: InvocationSummary[] = []
        let nextToken: string | undefined
        do {
            const output = await this.call('ListInvocations', () =>
                this.client.send(new ListInvocationsCommand({ sessionIdentifier: sessionId, nextToken }))
            )
            const page = normalizeInvocationPage(output)
            this.reportPage('ListInvocations', page, { sessionId })
            items.push(...page.items)
            nextToken = page.nextToken
        } while (nextToken)
        return items
    }

    async listInvocationSteps(sessionId: string, invocationId: string): Promise<StepSummary[]> {
        const items: StepSummary[] = []
        let nextToken: string | undefined
        do {
            const output = await this.call('ListInvocationSteps', () =>
                this.client.send(
                    new ListInvocationStepsCommand({
                        sessionIdentifier: sessionId,
                        invocationIdentifier: invocationId,
                        nextToken,
                    })
                )
            )
            const page = normalizeStepPage(output, invocationId)
            this.reportPage('ListInvocationSteps', page, { sessionId, invocationId })
            items.push(...page.items)
            nextToken = page.nextToken
        } while (nextToken)
        return items
    }

    async getInvocationStep(sessionId: string, invocationId: string, stepId: string): Promise<StepDetail> {
        const output = await this.call('GetInvocationStep', () =>
            this.client.send(
                new GetInvocationStepCommand({
                    sessionIdentifier: sessionId,
                    invocationIdentifier: invocationId,
                    invocationStepId: stepId,
                })
            )
        )
        return normalizeStepDetail(output, invocationId, stepId)
    }

    async putInvocationStep(
        sessionId: string,
        invocationId: string,
        stepId: string,
        stepTime: Date,
        blocks: ContentBlock[]
    ): Promise<string> {
        const output = await this.call('PutInvocationStep', () =>
            this.client.send(
                new PutInvocationStepCommand({
                    sessionIdentifier: sessionId,
                    invocationIdentifier: invocationId,
                    invocationStepId: stepId,
                    invocationStepTime: stepTime,
                    payload: { contentBlocks: blocks.map(toSdkBlock) },
                })
            )
        )
        return output.invocationStepId ?? stepId
    }

    private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        this.logger.debug({ operation }, 'gateway:request')
        try {
            return await fn()
        } catch (error) {
            const classified = classifyGatewayError(error)
            this.logger.debug({ operation, error: classified.name, err: error }, 'gateway:error')
            throw classified
        }
    }

    private reportPage(operation: string, page: Page<unknown>, ids: Record<string, string>): void {
        this.logger.debug({ operation, ...ids, field: page.field, items: page.items.length }, 'gateway:page')
        if (page.dropped > 0) {
            this.logger.warn({ operation, ...ids, dropped: page.dropped }, 'Listing entries without a usable id were dropped')
        }
    }
}

export function createBedrockGateway(config: Pick<ResolvedConfig, 'region' | 'endpoint'>, logger: Logger): SessionGateway {
    const client = new BedrockAgentRuntimeClient({
        region: config.region,
        ...(config.endpoint ? { endpoint: config.endpoint } : {}),
    })
    return new BedrockSessionGateway(client, logger)
}
