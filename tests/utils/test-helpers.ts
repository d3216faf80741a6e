import { AxiosHeaders, AxiosRequestConfig, AxiosResponse, RawAxiosResponseHeaders } from 'axios'
import { vi } from 'vitest'

import { ConsoleSink } from '../../src/util/Logger'
import { Account } from '../../src/interface/Account'
import { ConfigSettings } from '../../src/interface/Config'

export const LOGIN_PAGE = '<html><head><title>Panel login</title></head><body>'
    + '<form method="post"><input type="hidden" name="csrfmiddlewaretoken" value="tok123">'
    + '<input name="username"><input name="password" type="password"><button>Zaloguj się</button></form>'
    + '</body></html>'

export function htmlResponse(status: number, data: string, headers: RawAxiosResponseHeaders = {}): AxiosResponse<string> {
    return { status, statusText: '', data, headers, config: { headers: new AxiosHeaders() } }
}

export function makeAccount(overrides: Partial<Account> = {}): Account {
    return {
        panelUrl: 'https://panel1.example.com',
        username: 'alice',
        password: 'test-secret',
        ...overrides
    }
}

export function makeSettings(overrides: Partial<ConfigSettings> = {}): ConfigSettings {
    return {
        timeout: 30,
        retryCount: 2,
        retryDelay: 0.001,
        callbackTimeout: 60,
        ...overrides
    }
}

export function fakeSink() {
    return {
        log: vi.fn<(line: string) => void>(),
        warn: vi.fn<(line: string) => void>(),
        error: vi.fn<(line: string) => void>()
    } satisfies ConsoleSink
}

export type PanelRoutes = Record<string, AxiosResponse<string>>

/**
 * In-process panel stand-in: answers "METHOD url" keys from the route table and fails
 * unknown routes with a 404 page.
 */
export function panelRouter(routes: PanelRoutes) {
    return async (config: AxiosRequestConfig): Promise<AxiosResponse<string>> => {
        const key = `${String(config.method).toUpperCase()} ${config.url}`
        return routes[key] ?? htmlResponse(404, '<title>Not Found</title>')
    }
}
