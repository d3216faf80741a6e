import { Account } from './Account'

export type AccountState = 'NORMAL' | 'BANNED' | 'LOGIN_FAILED' | 'ERROR'

export const ACCOUNT_STATES: readonly AccountState[] = ['NORMAL', 'BANNED', 'LOGIN_FAILED', 'ERROR']

export type TransportFailureKind = 'timeout' | 'connection_error' | 'other'

export interface PanelResponse {
    ok: true;
    statusCode: number;
    body: string;
    /** Effective URL after redirects */
    url: string;
}

export interface TransportFailure {
    ok: false;
    kind: TransportFailureKind;
    message: string;
}

export type LoginAttemptResult = PanelResponse | TransportFailure

export interface Classification {
    state: AccountState;
    detail?: string;
}

export interface CallbackResult {
    command: string;
    ok: boolean;
    exitCode: number | null;
    stdout: string;
    stderr: string;
    /** Spawn failure, timeout or non-zero exit description */
    error?: string;
}

export interface AccountOutcome {
    readonly account: Account;
    readonly state: AccountState;
    readonly detail?: string;
    readonly attempts: number;
    readonly callback?: CallbackResult;
}

export interface RunSummary {
    outcomes: AccountOutcome[];
    counts: Record<AccountState, number>;
    exitCode: number;
    durationMs: number;
}
