import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'

export interface AuditEntry {
    action: 'session_deletion'
    sessionId: string
    timestamp: string
    reason: string
    approver: string
}

/**
 * Local record of destructive operations, kept for the operator. Entries are never sent
 * to the session service.
 */
export class AuditTrail {
    private recorded: AuditEntry[] = []

    constructor(
        private fs: FileSystem,
        private logger: Logger,
        private filePath?: string
    ) {}

    async record(entry: AuditEntry): Promise<void> {
        this.recorded.push(entry)
        this.logger.info({ audit: entry }, 'Audit record')
        if (this.filePath) {
            await this.fs.appendText(this.filePath, `${JSON.stringify(entry)}\n`)
        }
    }

    entries(): AuditEntry[] {
        return [...this.recorded]
    }
}
