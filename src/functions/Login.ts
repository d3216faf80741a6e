import { PanelClient } from './PanelClient'
import { StatusClassifier } from './Classifier'

import { LogFn } from '../util/Logger'
import Util, { Sleeper } from '../util/Utils'

import { Account } from '../interface/Account'
import { AccountOutcome, Classification } from '../interface/Outcome'

// Base wait before the second attempt; doubles per attempt up to the cap
export const RETRY_DELAY_MS = 2000
export const MAX_RETRY_DELAY_MS = 30000

export type LoginAttempter = Pick<PanelClient, 'attemptLogin'>

export interface LoginOptions {
    client: LoginAttempter
    classifier: StatusClassifier
    log: LogFn
    /** Base backoff in milliseconds, must be > 0 */
    retryDelayMs?: number
    sleep?: Sleeper
}

export function backoffDelay(failedAttempts: number, baseMs: number = RETRY_DELAY_MS): number {
    const base = baseMs > 0 ? baseMs : RETRY_DELAY_MS
    return Math.min(base * Math.pow(2, Math.max(0, failedAttempts - 1)), Math.max(base, MAX_RETRY_DELAY_MS))
}

export class Login {
    private client: LoginAttempter
    private classifier: StatusClassifier
    private log: LogFn
    private retryDelayMs: number
    private sleep: Sleeper
    private utils = new Util()

    constructor(options: LoginOptions) {
        this.client = options.client
        this.classifier = options.classifier
        this.log = options.log
        this.retryDelayMs = options.retryDelayMs && options.retryDelayMs > 0 ? options.retryDelayMs : RETRY_DELAY_MS
        this.sleep = options.sleep ?? ((ms: number) => this.utils.wait(ms))
    }

    /**
     * Up to `retryCount + 1` attempts. NORMAL, BANNED and LOGIN_FAILED come straight from
     * the panel and end the loop; only ERROR is retried.
     */
    async runWithRetries(account: Account, retryCount: number, timeoutSeconds: number): Promise<AccountOutcome> {
        const label = this.utils.panelLabel(account.panelUrl)
        const maxAttempts = Math.max(0, Math.floor(retryCount)) + 1

        let last: Classification = { state: 'ERROR', detail: 'no attempt made' }
        let attempts = 0

        while (attempts < maxAttempts) {
            attempts++
            this.log(label, 'LOGIN', `Attempt ${attempts}/${maxAttempts} for ${account.username}`, 'debug')

            const result = await this.client.attemptLogin(account.panelUrl, account.username, account.password, timeoutSeconds, account.proxy)
            last = this.classifier.classify(result)

            if (last.state !== 'ERROR') break

            if (attempts < maxAttempts) {
                const delay = backoffDelay(attempts, this.retryDelayMs)
                this.log(label, 'LOGIN-RETRY', `${account.username}: ${last.detail ?? 'error'}; retrying in ${delay}ms`, 'warn')
                await this.sleep(delay)
            }
        }

        const outcome: AccountOutcome = { account, state: last.state, attempts }
        return Object.freeze(last.detail !== undefined ? { ...outcome, detail: last.detail } : outcome)
    }
}
