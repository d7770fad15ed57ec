import type { ResolvedConfig } from '../config/schema.js'
import { ContextReconstructor } from '../context/reconstructor.js'
import { StepRecorder } from '../diagnostics/recorder.js'
import { createBedrockGateway } from '../gateway/bedrock.js'
import type { SessionGateway } from '../gateway/types.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { SessionProbe } from '../probe/session-probe.js'
import { AuditTrail } from '../sessions/audit.js'
import { SessionLifecycle } from '../sessions/lifecycle.js'
import { type FileSystem, NodeFileSystem } from './fs.js'

export interface Container {
    config: ResolvedConfig
    logger: Logger
    fs: FileSystem
    gateway: SessionGateway
    audit: AuditTrail
    lifecycle: SessionLifecycle
    recorder: StepRecorder
    reconstructor: ContextReconstructor
    probe: SessionProbe
}

export interface ContainerOverrides {
    logger?: Logger
    fs?: FileSystem
    gateway?: SessionGateway
    now?: () => Date
    sleep?: (ms: number) => Promise<void>
}

export function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? createLogger(config)
    const fs = overrides.fs ?? new NodeFileSystem()
    const gateway = overrides.gateway ?? createBedrockGateway(config, logger)
    const { now, sleep } = overrides

    const audit = new AuditTrail(fs, logger, config.auditLogFile)
    const lifecycle = new SessionLifecycle({ gateway, audit, logger, tags: config.sessionTags, now })
    const recorder = new StepRecorder({ gateway, fs, logger, retry: config.retry, now, sleep })
    const reconstructor = new ContextReconstructor({ gateway, logger })
    const probe = new SessionProbe({ gateway, logger, now })

    return { config, logger, fs, gateway, audit, lifecycle, recorder, reconstructor, probe }
}
