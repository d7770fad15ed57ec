import { z } from 'zod'

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const
export const SEVERITIES = ['high', 'medium', 'low'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]
export type Severity = (typeof SEVERITIES)[number]

export const RetrySchema = z.object({
    attempts: z.number().int().min(1).max(10).optional(),
    delayMs: z.number().int().min(0).optional(),
    backoff: z.enum(['fixed', 'exponential']).optional(),
    maxDelayMs: z.number().int().positive().optional(),
})

export const ConfigSchema = z.object({
    region: z.string().min(1).optional(),
    endpoint: z.string().url().optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
    retry: RetrySchema.optional(),
    defaultSeverity: z.enum(SEVERITIES).optional(),
    sessionTags: z.record(z.string()).optional(),
    auditLogFile: z.string().min(1).optional(),
})

export type Config = z.infer<typeof ConfigSchema>

export interface RetryPolicy {
    attempts: number
    delayMs: number
    backoff: 'fixed' | 'exponential'
    maxDelayMs: number
}

export interface ResolvedConfig {
    region: string
    endpoint?: string
    logLevel: LogLevel
    retry: RetryPolicy
    defaultSeverity: Severity
    sessionTags: Record<string, string>
    auditLogFile?: string
    projectDir: string
    configDir: string
}
