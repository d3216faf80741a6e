import { DEFAULT_CONFIG_FILE } from './Load'

export interface CliOptions {
    configPath: string
    noLog: boolean
    verbose: boolean
    help: boolean
}

export class CliError extends Error {
    constructor(message: string) {
        super(message)
        this.name = 'CliError'
    }
}

export const HELP_TEXT = `Usage: panel-keepalive [options]

Logs into every configured panel account so it is not suspended for inactivity.

Options:
  -c, --config <path>  config file (default: $CONFIG_PATH or ${DEFAULT_CONFIG_FILE})
      --no-log         do not write the log file
  -v, --verbose        show debug output
  -h, --help           show this help

Exit codes: 0 all accounts normal, 1 login failure or error, 2 an account is banned.`

export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliOptions {
    const opts: CliOptions = {
        configPath: env.CONFIG_PATH || DEFAULT_CONFIG_FILE,
        noLog: false,
        verbose: false,
        help: false
    }

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i] ?? ''
        switch (arg) {
            case '-c':
            case '--config': {
                const value = argv[i + 1]
                if (!value || value.startsWith('-')) throw new CliError(`${arg} requires a path`)
                opts.configPath = value
                i++
                break
            }
            case '--no-log':
                opts.noLog = true
                break
            case '-v':
            case '--verbose':
                opts.verbose = true
                break
            case '-h':
            case '--help':
                opts.help = true
                break
            default:
                if (arg.startsWith('--config=')) {
                    const value = arg.slice('--config='.length)
                    if (!value) throw new CliError('--config requires a path')
                    opts.configPath = value
                    break
                }
                throw new CliError(`Unknown argument: ${arg}`)
        }
    }

    return opts
}
