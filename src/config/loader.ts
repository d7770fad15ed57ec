import path from 'node:path'
import { ConfigError, errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { CONFIG_DIR, DEFAULT_CONFIG, GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, LOG_LEVELS, type LogLevel, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Partial<Config>
    projectDir?: string
    env?: NodeJS.ProcessEnv
}

async function loadJsonConfig(fs: FileSystem, filePath: string): Promise<Config> {
    if (!(await fs.exists(filePath))) return {}

    let raw: unknown
    try {
        raw = await fs.readJSON<unknown>(filePath)
    } catch (error) {
        throw new ConfigError(`Cannot read ${filePath}: ${errorMessage(error)}`, { cause: error })
    }

    const parsed = ConfigSchema.safeParse(raw)
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        throw new ConfigError(`Invalid config in ${filePath}: ${issues.join('; ')}`)
    }
    return parsed.data
}

function mergeConfigs(...configs: Config[]): Config {
    const merged: Config = {}
    for (const cfg of configs) {
        for (const [key, value] of Object.entries(cfg)) {
            if (value !== undefined) {
                ;(merged as Record<string, unknown>)[key] = value
            }
        }
    }
    return merged
}

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value)
}

function envConfig(env: NodeJS.ProcessEnv): Config {
    const config: Config = {}
    const region = env.INCIDENT_TRAIL_REGION || env.AWS_REGION
    if (region) config.region = region
    if (env.INCIDENT_TRAIL_ENDPOINT) config.endpoint = env.INCIDENT_TRAIL_ENDPOINT
    const level = env.INCIDENT_TRAIL_LOG_LEVEL
    if (level) {
        if (!isLogLevel(level)) throw new ConfigError(`INCIDENT_TRAIL_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`)
        config.logLevel = level
    }
    return config
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, projectDir = process.cwd(), env = process.env } = options

    const globalConfig = await loadJsonConfig(fs, GLOBAL_CONFIG_FILE)
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE))

    // Priority: CLI flags > env vars > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, envConfig(env), cliFlags)

    return {
        ...DEFAULT_CONFIG,
        ...merged,
        retry: { ...DEFAULT_CONFIG.retry, ...merged.retry },
        sessionTags: merged.sessionTags ?? DEFAULT_CONFIG.sessionTags,
        projectDir,
        configDir: CONFIG_DIR,
    }
}
