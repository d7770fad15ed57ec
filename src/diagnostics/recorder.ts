import { randomUUID } from 'node:crypto'
import { errorMessage, MalformedResponseError, RecorderError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { DEFAULT_RETRY_POLICY, type RetryPolicy, withRetry } from '../gateway/retry.js'
import type { ContentBlock, SessionGateway } from '../gateway/types.js'
import type { Logger } from '../logger/index.js'
import { type DiagnosticData, formatDiagnosticStep, invocationDescription } from './format.js'
import { loadImages } from './images.js'

export interface StepRecorderDeps {
    gateway: SessionGateway
    fs: FileSystem
    logger: Logger
    retry?: RetryPolicy
    now?: () => Date
    sleep?: (ms: number) => Promise<void>
}

export interface RecordedStep {
    invocationId: string
    stepId: string
    imageCount: number
    /** Whether the step could be read back after writing. */
    verified: boolean
}

export class StepRecorder {
    private gateway: SessionGateway
    private fs: FileSystem
    private logger: Logger
    private retry: RetryPolicy
    private now: () => Date
    private sleep?: (ms: number) => Promise<void>

    constructor(deps: StepRecorderDeps) {
        this.gateway = deps.gateway
        this.fs = deps.fs
        this.logger = deps.logger
        this.retry = deps.retry ?? DEFAULT_RETRY_POLICY
        this.now = deps.now ?? (() => new Date())
        this.sleep = deps.sleep
    }

    async record(
        sessionId: string,
        engineerId: string,
        data: DiagnosticData,
        imagePaths: readonly string[] = []
    ): Promise<RecordedStep> {
        // Fails with NotFoundError before anything is written.
        await this.gateway.getSession(sessionId)
        this.logger.debug({ sessionId }, 'recorder:session-validated')

        const invocationId = await this.createInvocation(sessionId, invocationDescription(data.component, engineerId))

        const images = await loadImages(imagePaths, this.fs, this.logger)
        const blocks: ContentBlock[] = [{ kind: 'text', text: formatDiagnosticStep(engineerId, data) }, ...images]

        const stepId = randomUUID()
        try {
            await this.gateway.putInvocationStep(sessionId, invocationId, stepId, this.now(), blocks)
        } catch (error) {
            throw new RecorderError('step-write-failed', `Could not store diagnostic step: ${errorMessage(error)}`, {
                cause: error,
                invocationId,
            })
        }
        this.logger.info({ sessionId, invocationId, stepId, images: images.length }, 'Diagnostic step recorded')

        return { invocationId, stepId, imageCount: images.length, verified: await this.verify(sessionId, invocationId, stepId) }
    }

    private async createInvocation(sessionId: string, description: string): Promise<string> {
        try {
            return await withRetry(() => this.gateway.createInvocation(sessionId, description), this.retry, {
                sleep: this.sleep,
                onRetry: (error, attempt, delayMs) => {
                    this.logger.warn(
                        { sessionId, attempt, maxAttempts: this.retry.attempts, delayMs, err: errorMessage(error) },
                        'Invocation creation failed, retrying'
                    )
                },
            })
        } catch (error) {
            const attempts = this.retry.attempts
            if (error instanceof MalformedResponseError) {
                throw new RecorderError('no-invocation-id', `No invocation id returned after ${attempts} attempts`, {
                    cause: error,
                })
            }
            throw new RecorderError(
                'invocation-failed',
                `Could not create invocation after ${attempts} attempts: ${errorMessage(error)}`,
                { cause: error }
            )
        }
    }

    private async verify(sessionId: string, invocationId: string, stepId: string): Promise<boolean> {
        try {
            await this.gateway.getInvocationStep(sessionId, invocationId, stepId)
            return true
        } catch (error) {
            this.logger.warn({ sessionId, invocationId, stepId, err: errorMessage(error) }, 'Could not verify the stored step')
            return false
        }
    }
}
