import chalk from 'chalk'
import fs from 'fs'
import path from 'path'

export type LogType = 'log' | 'warn' | 'error' | 'debug'

export type LogColor = 'red' | 'green' | 'yellow' | 'blue' | 'cyan' | 'magenta' | 'gray'

/**
 * scope: 'main' for the runner itself, otherwise the panel label of the account
 * title: short upper-case category of the line (LOGIN, CALLBACK, SUMMARY...)
 */
export type LogFn = (scope: string, title: string, message: string, type?: LogType, color?: LogColor) => Error | void

export interface Logger {
    log: LogFn
    /** Values masked in every line written after this call (account passwords) */
    addSecret(secret: string): void
}

export interface ConsoleSink {
    log(line: string): void
    warn(line: string): void
    error(line: string): void
}

export interface LoggerOptions {
    logFile?: string
    verbose?: boolean
    console?: ConsoleSink
}

const COLORS: Record<LogColor, (s: string) => string> = {
    red: chalk.red,
    green: chalk.green,
    yellow: chalk.yellow,
    blue: chalk.blue,
    cyan: chalk.cyan,
    magenta: chalk.magenta,
    gray: chalk.gray
}

// ASCII-safe icon map for PowerShell compatibility
const ICON_MAP: Array<[RegExp, string]> = [
    [/ban|suspend/i, '[BANNED]'],
    [/error|fatal/i, '[ERROR]'],
    [/warn/i, '[WARN]'],
    [/normal|success|complet/i, '[OK]'],
    [/callback/i, '[CALLBACK]'],
    [/retry/i, '[RETRY]'],
    [/login/i, '[LOGIN]'],
    [/summary/i, '[SUMMARY]'],
    [/config/i, '[CONFIG]'],
    [/main/i, '[MAIN]']
]

// Shorter values are not masked
const MIN_SECRET_LENGTH = 4

function timestamp(): string {
    const d = new Date()
    const pad = (n: number) => String(n).padStart(2, '0')
    return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
}

class RunLogger implements Logger {
    private logFile?: string
    private verbose: boolean
    private out: ConsoleSink
    private secrets = new Set<string>()

    constructor(options: LoggerOptions) {
        this.logFile = options.logFile
        this.verbose = !!options.verbose
        this.out = options.console ?? console

        if (this.logFile) {
            const dir = path.dirname(this.logFile)
            if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true })
        }
    }

    addSecret(secret: string): void {
        if (secret.length >= MIN_SECRET_LENGTH) this.secrets.add(secret)
    }

    private redact(s: string): string {
        let out = s
        for (const secret of this.secrets) {
            out = out.split(secret).join('***')
        }
        return out
    }

    private writeFile(line: string): void {
        if (!this.logFile) return
        try {
            fs.appendFileSync(this.logFile, line + '\n', 'utf-8')
        } catch (error) {
            const file = this.logFile
            this.logFile = undefined
            this.out.error(`[Logger] Disabled file sink ${file}: ${error instanceof Error ? error.message : String(error)}`)
        }
    }

    log: LogFn = (scope, title, message, type = 'log', color) => {
        const currentTime = timestamp()
        const scopeText = scope === 'main' ? 'MAIN' : scope
        const text = this.redact(message)
        const cleanStr = `[${currentTime}] [PID: ${process.pid}] [${type.toUpperCase()}] ${scopeText} [${title}] ${text}`

        // Debug lines always reach the file, the console only in verbose mode
        this.writeFile(cleanStr)

        if (type !== 'debug' || this.verbose) {
            const typeIndicator = type === 'error' ? '✗' : type === 'warn' ? '⚠' : type === 'debug' ? '·' : '✓'
            const typeColor = type === 'error' ? chalk.red : type === 'warn' ? chalk.yellow : type === 'debug' ? chalk.gray : chalk.green
            const scopeColor = scope === 'main' ? chalk.cyan : chalk.magenta

            let icon = ''
            for (const [pattern, symbol] of ICON_MAP) {
                if (pattern.test(title)) {
                    icon = chalk.dim(symbol) + ' '
                    break
                }
            }

            const formattedStr = [
                chalk.gray(`[${currentTime}]`),
                chalk.gray(`[${process.pid}]`),
                typeColor(typeIndicator),
                scopeColor(`[${scopeText}]`),
                chalk.bold(`[${title}]`),
                icon + text
            ].join(' ')

            const line = color ? COLORS[color](formattedStr) : formattedStr

            switch (type) {
                case 'warn':
                    this.out.warn(line)
                    break
                case 'error':
                    this.out.error(line)
                    break
                default:
                    this.out.log(line)
                    break
            }
        }

        // Return an Error when logging an error so callers can `throw log(...)`
        if (type === 'error') {
            return new Error(cleanStr)
        }
    }
}

export function createLogger(options: LoggerOptions = {}): Logger {
    return new RunLogger(options)
}
