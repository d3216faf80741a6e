import { Callback } from './functions/Callback'
import { StatusClassifier } from './functions/Classifier'
import { Login } from './functions/Login'
import { PanelClient } from './functions/PanelClient'

import AxiosClient, { HttpRequester } from './util/Axios'
import { CliError, CliOptions, HELP_TEXT, parseArgs } from './util/Cli'
import { loadConfig } from './util/Load'
import { ConsoleSink, createLogger, LogFn } from './util/Logger'
import Util, { shortErr } from './util/Utils'

import { Account } from './interface/Account'
import { Config, ConfigMarkers, ConfigSettings } from './interface/Config'
import { ACCOUNT_STATES, AccountOutcome, AccountState, RunSummary } from './interface/Outcome'

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_BANNED = 2

export function exitCodeFor(counts: Record<AccountState, number>): number {
    if (counts.BANNED > 0) return EXIT_BANNED
    if (counts.LOGIN_FAILED > 0 || counts.ERROR > 0) return EXIT_FAILURE
    return EXIT_OK
}

export function countStates(outcomes: AccountOutcome[]): Record<AccountState, number> {
    const counts: Record<AccountState, number> = { NORMAL: 0, BANNED: 0, LOGIN_FAILED: 0, ERROR: 0 }
    for (const o of outcomes) counts[o.state]++
    return counts
}

export interface KeepAliveOptions {
    log: LogFn
    markers?: ConfigMarkers
    /** One requester for the whole run; defaults to a fresh AxiosClient */
    http?: HttpRequester
    /** Replace the retry controller built from the run settings */
    login?: Pick<Login, 'runWithRetries'>
    /** Replace the callback executor built from the run settings */
    callback?: Pick<Callback, 'maybeInvoke'>
}

// Main runner class
export class KeepAliveBot {
    public log: LogFn
    public utils = new Util()
    private client: PanelClient
    private classifier: StatusClassifier
    private login?: Pick<Login, 'runWithRetries'>
    private callback?: Pick<Callback, 'maybeInvoke'>

    constructor(options: KeepAliveOptions) {
        this.log = options.log
        this.client = new PanelClient(options.http ?? new AxiosClient())
        this.classifier = new StatusClassifier(options.markers)
        this.login = options.login
        this.callback = options.callback
    }

    /**
     * Check every account in order, one at a time. A failure while handling one account is
     * recorded as that account's ERROR outcome and never stops the loop.
     */
    async runAll(accounts: Account[], settings: ConfigSettings): Promise<RunSummary> {
        const login = this.login ?? new Login({
            client: this.client,
            classifier: this.classifier,
            log: this.log,
            retryDelayMs: settings.retryDelay * 1000
        })
        const callback = this.callback ?? new Callback({
            log: this.log,
            timeoutMs: settings.callbackTimeout * 1000
        })

        const startedAt = Date.now()
        const outcomes: AccountOutcome[] = []

        this.log('main', 'MAIN', `Checking ${accounts.length} account(s)`)

        for (const account of accounts) {
            const label = this.utils.panelLabel(account.panelUrl)
            this.log(label, 'LOGIN', `Checking account ${account.username}...`)

            let outcome: AccountOutcome
            try {
                outcome = await login.runWithRetries(account, settings.retryCount, settings.timeout)
            } catch (error) {
                outcome = { account, state: 'ERROR', detail: `unexpected error: ${shortErr(error)}`, attempts: 0 }
            }

            try {
                const result = await callback.maybeInvoke(outcome, account.onBanned)
                if (result) outcome = { ...outcome, callback: result }
            } catch (error) {
                const command = account.onBanned ?? ''
                outcome = { ...outcome, callback: { command, ok: false, exitCode: null, stdout: '', stderr: '', error: shortErr(error) } }
                this.log(label, 'CALLBACK-WARN', `Callback crashed: ${shortErr(error)}`, 'warn')
            }

            const final = Object.freeze(outcome)
            this.report(final)
            outcomes.push(final)
        }

        const counts = countStates(outcomes)
        const summary: RunSummary = {
            outcomes,
            counts,
            exitCode: exitCodeFor(counts),
            durationMs: Date.now() - startedAt
        }

        this.log('main', 'SUMMARY', `Done: ${ACCOUNT_STATES.map(s => `${counts[s]} ${s}`).join(', ')} (exit code ${summary.exitCode})`,
            summary.exitCode === EXIT_OK ? 'log' : 'warn')

        return summary
    }

    private report(outcome: AccountOutcome): void {
        const label = this.utils.panelLabel(outcome.account.panelUrl)
        const detail = outcome.detail ? ` (${outcome.detail})` : ''
        const tries = outcome.attempts === 1 ? '1 attempt' : `${outcome.attempts} attempts`
        const who = outcome.account.username

        switch (outcome.state) {
            case 'NORMAL':
                this.log(label, 'ACCOUNT-NORMAL', `${who}: account is active${detail}`, 'log', 'green')
                break
            case 'BANNED':
                this.log(label, 'ACCOUNT-BANNED', `${who}: account is banned${detail}`, 'warn', 'red')
                break
            case 'LOGIN_FAILED':
                this.log(label, 'LOGIN-FAILED', `${who}: login rejected${detail}`, 'warn', 'yellow')
                break
            default:
                this.log(label, 'ACCOUNT-ERROR', `${who}: status unknown after ${tries}${detail}`, 'error')
                break
        }
    }
}

export interface MainOverrides {
    http?: HttpRequester
    console?: ConsoleSink
}

/**
 * Full run: parse arguments, load the config, check every account. Resolves with the
 * process exit code instead of exiting so it can be driven from tests.
 */
export async function main(argv: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env, overrides: MainOverrides = {}): Promise<number> {
    const out = overrides.console ?? console

    let args: CliOptions
    try {
        args = parseArgs(argv, env)
    } catch (error) {
        if (!(error instanceof CliError)) throw error
        out.error(`Error: ${error.message}\n\n${HELP_TEXT}`)
        return EXIT_FAILURE
    }

    if (args.help) {
        out.log(HELP_TEXT)
        return EXIT_OK
    }

    let config: Config
    try {
        config = loadConfig(args.configPath)
    } catch (error) {
        out.error(`Error: ${error instanceof Error ? error.message : String(error)}`)
        return EXIT_FAILURE
    }

    const logFile = args.noLog ? undefined : (env.LOG_PATH || config.settings.logFile)
    const logger = createLogger({ logFile, verbose: args.verbose, console: out })
    for (const account of config.accounts) logger.addSecret(account.password)

    logger.log('main', 'MAIN', `Loaded ${config.accounts.length} enabled account(s)${logFile ? `, logging to ${logFile}` : ''}`, 'debug')

    const bot = new KeepAliveBot({
        log: logger.log,
        markers: config.markers,
        http: overrides.http
    })

    const summary = await bot.runAll(config.accounts, config.settings)
    return summary.exitCode
}
