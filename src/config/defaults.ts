import type { ResolvedConfig } from './schema.js'

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'projectDir' | 'configDir'> = {
    region: 'us-east-1',
    logLevel: 'warn',
    retry: { attempts: 3, delayMs: 1000, backoff: 'fixed', maxDelayMs: 30000 },
    defaultSeverity: 'high',
    sessionTags: {
        Environment: 'Development',
        IncidentType: 'PerformanceDegradation',
        Demo: 'True',
    },
}

export const CONFIG_DIR = `${process.env.HOME ?? '~'}/.config/incident-trail`
export const GLOBAL_CONFIG_FILE = `${CONFIG_DIR}/config.json`
export const LOCAL_CONFIG_DIR = '.incident-trail'
export const LOCAL_CONFIG_FILE = `${LOCAL_CONFIG_DIR}/config.json`
