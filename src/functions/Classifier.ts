import { load } from 'cheerio'

import Util from '../util/Utils'

import { ConfigMarkers } from '../interface/Config'
import { Classification, LoginAttemptResult, PanelResponse } from '../interface/Outcome'

import defaultMarkers from '../markers.json'

export interface MarkerPattern {
    re: RegExp
    label: string
}

export interface CompiledMarkers {
    banned: MarkerPattern[]
    loggedIn: MarkerPattern[]
    dashboardPaths: string[]
    loginForm: MarkerPattern[]
    invalidCredentials: MarkerPattern[]
    validity: MarkerPattern[]
}

const SNIPPET_LENGTH = 120
// Django form errors and bootstrap alerts
const ALERT_SELECTOR = '.errorlist, [class*="alert"]'

const utils = new Util()

export const DEFAULT_MARKERS: ConfigMarkers = defaultMarkers

function compileList(markers: string[]): MarkerPattern[] {
    return markers
        .map(m => m.trim())
        .filter(m => m.length > 0)
        .map(m => ({ re: new RegExp(utils.escapeRegExp(m), 'i'), label: m }))
}

export function compileMarkers(markers: ConfigMarkers): CompiledMarkers {
    return {
        banned: compileList(markers.banned),
        loggedIn: compileList(markers.loggedIn),
        dashboardPaths: markers.dashboardPaths.map(p => p.trim().toLowerCase()).filter(p => p.length > 0),
        loginForm: compileList(markers.loginForm),
        invalidCredentials: compileList(markers.invalidCredentials),
        validity: compileList(markers.validity)
    }
}

function firstMatch(patterns: MarkerPattern[], text: string): MarkerPattern | undefined {
    return patterns.find(p => p.re.test(text))
}

// Text right after a label, up to the next tag or line break: "Konto zablokowane: TOS" -> "TOS"
function textAfter(label: string, body: string): string | undefined {
    const re = new RegExp(`${utils.escapeRegExp(label)}[:\\s]*([^<\\n]+)`, 'i')
    const match = re.exec(body)
    const text = match?.[1] ? utils.collapseWhitespace(match[1]) : ''
    return text || undefined
}

function onDashboard(url: string, paths: string[]): boolean {
    if (paths.length === 0) return false
    try {
        const pathname = new URL(url).pathname.toLowerCase()
        return paths.some(p => pathname.startsWith(p))
    } catch {
        return false
    }
}

export function responseSnippet(response: PanelResponse): string {
    const $ = load(response.body)
    const title = utils.collapseWhitespace($('title').first().text())
    if (title) return title

    $('script, style, title').remove()
    const text = utils.collapseWhitespace($.root().text())
    return text ? text.slice(0, SNIPPET_LENGTH) : '(empty body)'
}

function alertText(body: string): string {
    const $ = load(body)
    return utils.collapseWhitespace($(ALERT_SELECTOR).first().text())
}

export class StatusClassifier {
    private markers: CompiledMarkers

    constructor(markers: ConfigMarkers = DEFAULT_MARKERS) {
        this.markers = compileMarkers(markers)
    }

    /**
     * Map one login attempt to an account state. Ban markers are checked first because ban
     * pages can still carry login-form artifacts; anything unrecognized is ERROR.
     */
    classify(result: LoginAttemptResult): Classification {
        if (!result.ok) {
            return { state: 'ERROR', detail: `${result.kind}: ${result.message}` }
        }

        const body = result.body
        const m = this.markers

        const ban = firstMatch(m.banned, body)
        if (ban) {
            return { state: 'BANNED', detail: textAfter(ban.label, body) ?? `ban marker "${ban.label}"` }
        }

        if (onDashboard(result.url, m.dashboardPaths) || firstMatch(m.loggedIn, body)) {
            const validity = m.validity
                .map(v => textAfter(v.label, body))
                .find((t): t is string => t !== undefined)
            return validity ? { state: 'NORMAL', detail: `valid until ${validity}` } : { state: 'NORMAL' }
        }

        const invalid = firstMatch(m.invalidCredentials, body)
        if (invalid && firstMatch(m.loginForm, body)) {
            const message = alertText(body)
            return { state: 'LOGIN_FAILED', detail: message || `invalid credentials marker "${invalid.label}"` }
        }

        return {
            state: 'ERROR',
            detail: `unrecognized response (HTTP ${result.statusCode} at ${result.url}): ${responseSnippet(result)}`
        }
    }
}
