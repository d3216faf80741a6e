import { ChildProcess, spawn } from 'child_process'

import { LogFn } from '../util/Logger'
import Util, { shortErr } from '../util/Utils'

import { AccountOutcome, CallbackResult } from '../interface/Outcome'

export const CALLBACK_TIMEOUT_MS = 60000
const MAX_CAPTURE = 4096
// Time to drain output after the shell exits
const EXIT_GRACE_MS = 100

export type CommandRunner = (command: string, timeoutMs: number) => Promise<CallbackResult>

export interface CallbackOptions {
    log: LogFn
    timeoutMs?: number
    run?: CommandRunner
}

function append(buf: string, chunk: Buffer | string): string {
    if (buf.length >= MAX_CAPTURE) return buf
    return (buf + chunk.toString()).slice(0, MAX_CAPTURE)
}

/**
 * Run an operator command through the system shell and capture its exit status.
 * Resolves in every case: spawn errors, non-zero exits and timeouts become `ok: false`.
 * The command runs in its own process group so a timeout also kills whatever it started.
 */
export function runShellCommand(command: string, timeoutMs: number = CALLBACK_TIMEOUT_MS): Promise<CallbackResult> {
    return new Promise<CallbackResult>((resolve) => {
        let stdout = ''
        let stderr = ''
        let settled = false
        let timer: NodeJS.Timeout | undefined
        let graceTimer: NodeJS.Timeout | undefined

        const finish = (result: Omit<CallbackResult, 'command' | 'stdout' | 'stderr'>) => {
            if (settled) return
            settled = true
            if (timer) clearTimeout(timer)
            if (graceTimer) clearTimeout(graceTimer)
            resolve({ command, stdout: stdout.trim(), stderr: stderr.trim(), ...result })
        }

        let child: ChildProcess
        try {
            child = spawn(command, { shell: true, detached: true, stdio: ['ignore', 'pipe', 'pipe'] })
        } catch (error) {
            finish({ ok: false, exitCode: null, error: `spawn failed: ${shortErr(error)}` })
            return
        }

        // Background jobs of the command inherit the pipes; stop reading instead of waiting for them
        const releasePipes = () => {
            child.stdout?.destroy()
            child.stderr?.destroy()
        }

        const exitResult = (code: number | null, signal: NodeJS.Signals | null) => {
            if (code === 0) return finish({ ok: true, exitCode: 0 })
            finish({ ok: false, exitCode: code, error: signal ? `killed by ${signal}` : `exited with code ${code}` })
        }

        timer = setTimeout(() => {
            killGroup(child)
            releasePipes()
            finish({ ok: false, exitCode: null, error: `timed out after ${timeoutMs}ms` })
        }, timeoutMs)

        child.stdout?.on('data', (chunk: Buffer) => { stdout = append(stdout, chunk) })
        child.stderr?.on('data', (chunk: Buffer) => { stderr = append(stderr, chunk) })

        child.on('error', (error) => {
            finish({ ok: false, exitCode: null, error: `spawn failed: ${error.message}` })
        })

        child.on('exit', (code, signal) => {
            if (settled) return
            graceTimer = setTimeout(() => {
                releasePipes()
                exitResult(code, signal)
            }, EXIT_GRACE_MS)
        })

        child.on('close', exitResult)
    })
}

function killGroup(child: ChildProcess): void {
    if (child.pid === undefined) return
    try {
        process.kill(-child.pid, 'SIGKILL')
    } catch {
        // Group already gone, or no process groups on this platform
        child.kill('SIGKILL')
    }
}

export class Callback {
    private log: LogFn
    private timeoutMs: number
    private run: CommandRunner
    private utils = new Util()

    constructor(options: CallbackOptions) {
        this.log = options.log
        this.timeoutMs = options.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : CALLBACK_TIMEOUT_MS
        this.run = options.run ?? runShellCommand
    }

    /**
     * Runs `command` only for BANNED outcomes with a non-empty command. Never throws: a
     * failing command is returned (and logged) as a failed CallbackResult.
     */
    async maybeInvoke(outcome: AccountOutcome, command?: string): Promise<CallbackResult | undefined> {
        const cmd = command?.trim()
        if (outcome.state !== 'BANNED' || !cmd) return undefined

        const label = this.utils.panelLabel(outcome.account.panelUrl)
        this.log(label, 'CALLBACK', `Running on_banned command for ${outcome.account.username}: ${cmd}`)

        let result: CallbackResult
        try {
            result = await this.run(cmd, this.timeoutMs)
        } catch (error) {
            result = { command: cmd, ok: false, exitCode: null, stdout: '', stderr: '', error: shortErr(error) }
        }

        if (result.ok) {
            this.log(label, 'CALLBACK', `Command finished${result.stdout ? `: ${result.stdout}` : ''}`, 'debug')
        } else {
            this.log(label, 'CALLBACK-WARN', `Command failed (${result.error ?? 'unknown error'})${result.stderr ? `: ${result.stderr}` : ''}`, 'warn')
        }
        return result
    }
}
