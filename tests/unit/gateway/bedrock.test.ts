import { describe, it, expect, vi } from 'vitest'
import {
    type BedrockAgentRuntimeClient,
    CreateInvocationCommand,
    GetInvocationStepCommand,
    GetSessionCommand,
    ListInvocationsCommand,
    ListInvocationStepsCommand,
    PutInvocationStepCommand,
    ResourceNotFoundException,
} from '@aws-sdk/client-bedrock-agent-runtime'
import { MalformedResponseError, NotFoundError } from '../../../src/core/errors.js'
import { BedrockSessionGateway, toSdkBlock } from '../../../src/gateway/bedrock.js'
import { createSilentLogger } from '../../../src/logger/index.js'

function gatewayWith(respond: (command: unknown) => unknown) {
    const send = vi.fn(async (command: unknown) => respond(command))
    const client = { send } as unknown as BedrockAgentRuntimeClient
    return { gateway: new BedrockSessionGateway(client, createSilentLogger()), send }
}

describe('BedrockSessionGateway', () => {
    it('follows nextToken across invocation pages', async () => {
        const tokens: Array<string | undefined> = []
        const { gateway } = gatewayWith((command) => {
            if (!(command instanceof ListInvocationsCommand)) throw new Error('unexpected command')
            tokens.push(command.input.nextToken)
            return command.input.nextToken
                ? { invocationSummaries: [{ invocationId: 'inv-2' }] }
                : { invocationSummaries: [{ invocationId: 'inv-1' }], nextToken: 'page-2' }
        })

        const invocations = await gateway.listInvocations('sess-1')

        expect(invocations.map((i) => i.invocationId)).toEqual(['inv-1', 'inv-2'])
        expect(tokens).toEqual([undefined, 'page-2'])
    })

    it('passes session and invocation identifiers when listing steps', async () => {
        const { gateway, send } = gatewayWith(() => ({
            invocationStepSummaries: [{ invocationStepId: 'st-1', invocationStepTime: '2025-03-01T10:00:00Z' }],
        }))

        const steps = await gateway.listInvocationSteps('sess-1', 'inv-1')

        expect(steps).toEqual([{ invocationStepId: 'st-1', invocationId: 'inv-1', stepTime: '2025-03-01T10:00:00Z' }])
        const command = send.mock.calls[0]?.[0]
        expect(command).toBeInstanceOf(ListInvocationStepsCommand)
        if (command instanceof ListInvocationStepsCommand) {
            expect(command.input).toEqual({ sessionIdentifier: 'sess-1', invocationIdentifier: 'inv-1', nextToken: undefined })
        }
    })

    it('maps a missing session to NotFoundError', async () => {
        const { gateway } = gatewayWith(() => {
            throw new ResourceNotFoundException({ message: 'Session sess-9 not found', $metadata: {} })
        })

        const read = gateway.getSession('sess-9')
        await expect(read).rejects.toBeInstanceOf(NotFoundError)
        await expect(read).rejects.toThrow('Session sess-9 not found')
    })

    it('normalizes the session read', async () => {
        const { gateway, send } = gatewayWith(() => ({
            sessionId: 'sess-1',
            sessionStatus: 'ENDED',
            createdAt: new Date('2025-03-01T10:00:00.000Z'),
            lastUpdatedAt: new Date('2025-03-01T11:00:00.000Z'),
            sessionMetadata: { incidentId: 'INC-7' },
        }))

        const session = await gateway.getSession('sess-1')

        expect(session.status).toBe('ended')
        expect(session.metadata).toEqual({ incidentId: 'INC-7' })
        expect(send.mock.calls[0]?.[0]).toBeInstanceOf(GetSessionCommand)
    })

    it('rejects an invocation response without an id', async () => {
        const { gateway } = gatewayWith((command) => {
            expect(command).toBeInstanceOf(CreateInvocationCommand)
            return { sessionId: 'sess-1' }
        })

        await expect(gateway.createInvocation('sess-1', 'diagnosis')).rejects.toBeInstanceOf(MalformedResponseError)
    })

    it('writes text and image blocks in the request payload', async () => {
        const bytes = new Uint8Array([1, 2, 3])
        const stepTime = new Date('2025-03-01T10:00:00.000Z')
        const { gateway, send } = gatewayWith(() => ({ invocationStepId: 'st-1' }))

        const stepId = await gateway.putInvocationStep('sess-1', 'inv-1', 'st-1', stepTime, [
            { kind: 'text', text: 'Checked the pool' },
            { kind: 'image', format: 'jpeg', bytes },
        ])

        expect(stepId).toBe('st-1')
        const command = send.mock.calls[0]?.[0]
        expect(command).toBeInstanceOf(PutInvocationStepCommand)
        if (command instanceof PutInvocationStepCommand) {
            expect(command.input).toEqual({
                sessionIdentifier: 'sess-1',
                invocationIdentifier: 'inv-1',
                invocationStepId: 'st-1',
                invocationStepTime: stepTime,
                payload: {
                    contentBlocks: [{ text: 'Checked the pool' }, { image: { format: 'jpeg', source: { bytes } } }],
                },
            })
        }
    })

    it('falls back to the requested step id when the response omits it', async () => {
        const { gateway } = gatewayWith(() => ({}))
        const stepId = await gateway.putInvocationStep('sess-1', 'inv-1', 'st-local', new Date(0), [])
        expect(stepId).toBe('st-local')
    })

    it('reads a step back into canonical blocks', async () => {
        const { gateway } = gatewayWith((command) => {
            if (!(command instanceof GetInvocationStepCommand)) throw new Error('unexpected command')
            return {
                invocationStep: {
                    sessionId: 'sess-1',
                    invocationId: command.input.invocationIdentifier,
                    invocationStepId: command.input.invocationStepId,
                    invocationStepTime: new Date('2025-03-01T10:00:00.000Z'),
                    payload: { contentBlocks: [{ text: 'note' }] },
                },
            }
        })

        const detail = await gateway.getInvocationStep('sess-1', 'inv-1', 'st-1')

        expect(detail).toEqual({
            invocationStepId: 'st-1',
            invocationId: 'inv-1',
            stepTime: '2025-03-01T10:00:00.000Z',
            blocks: [{ kind: 'text', text: 'note' }],
        })
    })
})

describe('toSdkBlock', () => {
    it('converts text blocks', () => {
        expect(toSdkBlock({ kind: 'text', text: 'hello' })).toEqual({ text: 'hello' })
    })
})
