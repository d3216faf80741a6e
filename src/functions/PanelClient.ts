import axios, { AxiosResponse, Method } from 'axios'
import { load } from 'cheerio'

import { HttpRequester } from '../util/Axios'
import { shortErr } from '../util/Utils'

import { AccountProxy } from '../interface/Account'
import { LoginAttemptResult, PanelResponse, TransportFailure } from '../interface/Outcome'

const DEFAULT_HEADERS: Record<string, string> = {
    'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.5'
}

const MAX_REDIRECTS = 5
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308])
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT'])

class LoginFlowError extends Error {}

/**
 * Minimal per-call cookie store for one panel host. Cookie attributes (domain, path,
 * expiry) are ignored; the client only fills it from, and sends it to, the panel host.
 */
export class CookieJar {
    private cookies = new Map<string, string>()

    store(setCookie: string[] | undefined): void {
        for (const line of setCookie ?? []) {
            const pair = line.split(';')[0] ?? ''
            const eq = pair.indexOf('=')
            if (eq <= 0) continue
            const name = pair.slice(0, eq).trim()
            const value = pair.slice(eq + 1).trim()
            if (!value || value === '""' || /max-age=0\b/i.test(line)) {
                this.cookies.delete(name)
            } else {
                this.cookies.set(name, value)
            }
        }
    }

    get(name: string): string | undefined {
        return this.cookies.get(name)
    }

    header(): string | undefined {
        if (this.cookies.size === 0) return undefined
        return [...this.cookies].map(([k, v]) => `${k}=${v}`).join('; ')
    }
}

export function extractCsrfToken(html: string, jar?: CookieJar): string | undefined {
    const value = load(html)('input[name="csrfmiddlewaretoken"]').first().attr('value')
    if (value) return value
    // Django also accepts the csrftoken cookie's value
    return jar?.get('csrftoken')
}

export function toTransportFailure(err: unknown): TransportFailure {
    if (err instanceof LoginFlowError) {
        return { ok: false, kind: 'other', message: err.message }
    }
    if (axios.isAxiosError(err)) {
        if (err.code && TIMEOUT_CODES.has(err.code)) {
            return { ok: false, kind: 'timeout', message: err.message }
        }
        if (!err.response) {
            const code = err.code ? `${err.code}: ` : ''
            return { ok: false, kind: 'connection_error', message: `${code}${err.message}` }
        }
    }
    return { ok: false, kind: 'other', message: shortErr(err) }
}

export class PanelClient {
    private http: HttpRequester

    constructor(http: HttpRequester) {
        this.http = http
    }

    /**
     * Log into `{panelUrl}/login/` with a fresh cookie jar. Never throws; network and flow
     * problems come back as a transport failure for the caller's retry policy.
     */
    async attemptLogin(panelUrl: string, username: string, password: string, timeoutSeconds: number, proxy?: AccountProxy): Promise<LoginAttemptResult> {
        const base = panelUrl.replace(/\/+$/, '')
        const loginUrl = `${base}/login/`
        const jar = new CookieJar()
        const timeout = Math.max(1, Math.round(timeoutSeconds * 1000))

        try {
            const loginPage = await this.send('GET', loginUrl, jar, timeout, proxy)
            const csrfToken = extractCsrfToken(loginPage.body, jar)
            if (!csrfToken) {
                throw new LoginFlowError(`CSRF token not found on ${loginPage.url} (HTTP ${loginPage.statusCode})`)
            }

            const form = new URLSearchParams({
                csrfmiddlewaretoken: csrfToken,
                username,
                password,
                next: '/'
            })

            return await this.send('POST', loginUrl, jar, timeout, proxy, form.toString(), {
                'Referer': loginUrl,
                'Origin': base,
                'Content-Type': 'application/x-www-form-urlencoded'
            })
        } catch (error) {
            return toTransportFailure(error)
        }
    }

    // Redirects are followed here rather than by axios so each hop sees the cookies set by the previous one
    private async send(method: Method, startUrl: string, jar: CookieJar, timeout: number, proxy?: AccountProxy, data?: string, headers: Record<string, string> = {}): Promise<PanelResponse> {
        let url = startUrl
        const panelHost = new URL(startUrl).host

        for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
            // The jar only holds the panel's cookies; other hosts reached by a redirect get none
            const samePanel = new URL(url).host === panelHost
            const cookie = samePanel ? jar.header() : undefined
            const response: AxiosResponse<string> = await this.http.request({
                url,
                method,
                data,
                timeout,
                maxRedirects: 0,
                responseType: 'text',
                validateStatus: () => true,
                headers: {
                    ...DEFAULT_HEADERS,
                    ...headers,
                    ...(cookie ? { 'Cookie': cookie } : {})
                }
            }, proxy)

            if (samePanel) jar.store(response.headers['set-cookie'])

            const location = response.headers['location']
            if (REDIRECT_STATUSES.has(response.status) && typeof location === 'string' && location) {
                url = new URL(location, url).toString()
                if (response.status !== 307 && response.status !== 308) {
                    method = 'GET'
                    data = undefined
                    headers = {}
                }
                continue
            }

            return {
                ok: true,
                statusCode: response.status,
                body: typeof response.data === 'string' ? response.data : String(response.data ?? ''),
                url
            }
        }

        throw new LoginFlowError(`Too many redirects (>${MAX_REDIRECTS}) starting at ${startUrl}`)
    }
}
