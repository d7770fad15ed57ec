import { Command } from 'commander'
import { loadConfig } from '../config/loader.js'
import { type Container, type ContainerOverrides, createContainer } from '../core/container.js'
import { errorMessage } from '../core/errors.js'
import { NodeFileSystem } from '../core/fs.js'
import { clackIO } from './prompts.js'
import { renderContext, renderProbeReport } from './render.js'
import { InteractiveShell } from './shell.js'
import { formatError } from './ui.js'

interface GlobalOptions {
    region?: string
    debug?: boolean
}

export interface ProgramOptions extends ContainerOverrides {
    env?: NodeJS.ProcessEnv
}

async function bootstrap(options: GlobalOptions, overrides: ProgramOptions): Promise<Container> {
    const { env, ...containerOverrides } = overrides
    const fs = overrides.fs ?? new NodeFileSystem()
    const config = await loadConfig({
        fs,
        env,
        cliFlags: {
            region: options.region,
            logLevel: options.debug ? 'debug' : undefined,
        },
    })
    return createContainer(config, { ...containerOverrides, fs })
}

function fail(error: unknown): never {
    console.error(formatError(errorMessage(error)))
    process.exit(1)
}

export function createProgram(overrides: ProgramOptions = {}): Command {
    const program = new Command()

    program
        .name('incident-trail')
        .description('Incident diagnosis workflow on Bedrock session management')
        .version('0.1.0')
        .option('-r, --region <region>', 'AWS region (default: us-east-1)')
        .option('--debug', 'Enable debug logging')
        .action(async () => {
            let container: Container
            try {
                container = await bootstrap(program.opts<GlobalOptions>(), overrides)
            } catch (error) {
                fail(error)
            }
            try {
                await new InteractiveShell(container, clackIO).run()
            } catch (error) {
                fail(error)
            }
        })

    program
        .command('context <sessionId>')
        .description('Print the reconstructed diagnostic context of a session')
        .option('--json', 'Print the context as JSON')
        .action(async (sessionId: string, options: { json?: boolean }) => {
            try {
                const container = await bootstrap(program.opts<GlobalOptions>(), overrides)
                const context = await container.reconstructor.reconstruct(sessionId)
                console.log(options.json ? JSON.stringify(context, null, 2) : renderContext(context))
            } catch (error) {
                fail(error)
            }
        })

    program
        .command('probe <sessionId>')
        .description('Run the session-management probe against a session')
        .action(async (sessionId: string) => {
            try {
                const container = await bootstrap(program.opts<GlobalOptions>(), overrides)
                const report = await container.probe.run(sessionId)
                console.log(renderProbeReport(report))
            } catch (error) {
                fail(error)
            }
        })

    return program
}
