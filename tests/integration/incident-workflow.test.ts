import { describe, it, expect } from 'vitest'
import { DEFAULT_CONFIG } from '../../src/config/defaults.js'
import { truncate } from '../../src/context/reconstructor.js'
import { createContainer } from '../../src/core/container.js'
import { ConflictError } from '../../src/core/errors.js'
import { MockFileSystem } from '../../src/core/fs.js'
import { type DiagnosticData, formatDiagnosticStep } from '../../src/diagnostics/format.js'
import { createSilentLogger } from '../../src/logger/index.js'
import { InMemorySessionGateway, tickingClock } from '../helpers/in-memory-gateway.js'

const poolStep: DiagnosticData = {
    component: 'db-pool',
    action: 'Counted open connections',
    result: 'Hypothesis: a connection leak in the checkout worker',
    nextSteps: 'Capture a heap dump',
}

const cacheStep: DiagnosticData = {
    component: 'cache',
    action: 'Compared hit ratios before and after the deploy',
    result: 'Hit ratio unchanged',
    nextSteps: 'Rule out the cache',
}

function setup() {
    const clock = tickingClock()
    const gateway = new InMemorySessionGateway({ now: clock })
    const fs = new MockFileSystem()
    const container = createContainer(
        { ...DEFAULT_CONFIG, auditLogFile: '/audit/trail.jsonl', projectDir: '/work', configDir: '/config' },
        { gateway, fs, logger: createSilentLogger(), now: clock, sleep: async () => {} }
    )
    return { gateway, fs, container }
}

describe('incident workflow', () => {
    it('opens, records, reconstructs, closes and deletes a session', async () => {
        const { gateway, fs, container } = setup()
        const { lifecycle, recorder, reconstructor } = container
        const screenshot = new Uint8Array([137, 80, 78, 71])
        fs.setFile('/shots/cache.png', screenshot)

        const sessionId = await lifecycle.open('INC-3001', 'checkout-api', 'high')
        const first = await recorder.record(sessionId, 'ana', poolStep)
        const second = await recorder.record(sessionId, 'bo', cacheStep, ['/shots/missing.png', '/shots/cache.png'])

        expect([sessionId, first.invocationId, second.invocationId]).toEqual(['session-1', 'inv-2', 'inv-3'])
        expect(second.imageCount).toBe(1)

        const open = await reconstructor.reconstruct(sessionId)
        expect(open.incidentInfo).toEqual({
            incidentId: 'INC-3001',
            systemAffected: 'checkout-api',
            severity: 'high',
            startedAt: '2025-01-01T00:00:01.000Z',
            status: 'Active',
        })
        expect(open.diagnosticTimeline.map((e) => [e.timestamp, e.engineer, e.steps.length])).toEqual([
            ['2025-01-01T00:00:02.000Z', 'ana', 1],
            ['2025-01-01T00:00:04.000Z', 'bo', 1],
        ])
        expect(open.componentsTested).toEqual(['db-pool', 'cache'])
        expect(open.hypotheses).toEqual([
            { text: formatDiagnosticStep('ana', poolStep), timestamp: '2025-01-01T00:00:03.000Z', engineer: 'ana' },
        ])
        expect(open.screenshots).toEqual([
            {
                stepId: second.stepId,
                invocationId: 'inv-3',
                timestamp: '2025-01-01T00:00:05.000Z',
                associatedText: truncate(formatDiagnosticStep('bo', cacheStep), 100),
            },
        ])
        expect(open.diagnosticTimeline[1]?.steps[0]?.imageRefs).toEqual([{ stepId: second.stepId, format: 'png' }])

        const closed = await lifecycle.close(sessionId, 'Patched the connection leak', 'fix')
        expect(closed.invocationId).toBe('inv-4')

        const after = await reconstructor.reconstruct(sessionId)
        expect(after.incidentInfo.status).toBe('Closed')
        expect(after.diagnosticTimeline.map((e) => [e.description, e.engineer])).toEqual([
            ['diagnosis of db-pool by ana', 'ana'],
            ['diagnosis of cache by bo', 'bo'],
            ['incident resolution', 'Unknown'],
        ])

        await expect(lifecycle.close(sessionId, 'again', 'fix')).rejects.toBeInstanceOf(ConflictError)
        expect(gateway.callsTo('endSession')).toHaveLength(1)

        const outcome = await lifecycle.delete(sessionId, 'exercise data', 'lead-1', async () => true)
        expect(outcome.deleted).toBe(true)
        expect(gateway.hasSession(sessionId)).toBe(false)
        expect(await fs.readText('/audit/trail.jsonl')).toBe(
            '{"action":"session_deletion","sessionId":"session-1","timestamp":"2025-01-01T00:00:09.000Z","reason":"exercise data","approver":"lead-1"}\n'
        )
    })

    it('lists no component for a step recorded without one', async () => {
        const { gateway, container } = setup()
        gateway.seedSession({ sessionId: 's1' })

        await container.recorder.record('s1', 'ana', { ...poolStep, component: '' })
        const context = await container.reconstructor.reconstruct('s1')

        expect(context.componentsTested).toEqual([])
        expect(context.diagnosticTimeline[0]?.description).toBe('diagnosis of unknown system by ana')
    })

    it('recovers from transient invocation failures during recording', async () => {
        const { gateway, container } = setup()
        gateway.seedSession({ sessionId: 's1' })
        gateway.failNext('createInvocation', new Error('connection reset'), 2)

        const recorded = await container.recorder.record('s1', 'ana', poolStep)

        expect(gateway.callsTo('createInvocation')).toHaveLength(3)
        expect(gateway.stepsOf('s1', recorded.invocationId)).toHaveLength(1)
    })
})
