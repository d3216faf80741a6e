import fs from 'fs'
import path from 'path'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'

import { Account } from '../interface/Account'
import { Config, ConfigMarkers } from '../interface/Config'
import { DEFAULT_MARKERS } from '../functions/Classifier'

export const DEFAULT_CONFIG_FILE = 'config.yaml'
export const DEFAULT_LOG_FILE = 'keepalive.log'

export class ConfigError extends Error {
    readonly issues: string[]

    constructor(message: string, issues: string[] = []) {
        super(issues.length ? `${message}:\n  - ${issues.join('\n  - ')}` : message)
        this.name = 'ConfigError'
        this.issues = issues
    }
}

const markerList = z.array(z.string().min(1)).min(1)

const proxySchema = z.object({
    url: z.string().min(1),
    port: z.coerce.number().int().positive().optional(),
    username: z.string().optional(),
    password: z.string().optional()
})

const accountSchema = z.object({
    panel_url: z.string().url(),
    username: z.string().min(1),
    password: z.union([z.string().min(1), z.number()]).transform(v => String(v)),
    on_banned: z.string().nullish(),
    enabled: z.boolean().optional(),
    proxy: proxySchema.nullish()
})

const settingsSchema = z.object({
    timeout: z.number().positive().default(30),
    retry_count: z.number().int().nonnegative().default(3),
    retry_delay: z.number().positive().default(2),
    callback_timeout: z.number().positive().default(60),
    log_file: z.string().min(1).nullish()
})

const configSchema = z.object({
    settings: settingsSchema.nullish(),
    markers: z.object({
        banned: markerList,
        logged_in: markerList,
        dashboard_paths: z.array(z.string().min(1)),
        login_form: markerList,
        invalid_credentials: markerList,
        validity: z.array(z.string().min(1))
    }).partial().nullish(),
    accounts: z.array(accountSchema).min(1, 'at least one account is required')
})

type RawConfig = z.infer<typeof configSchema>

function toAccount(raw: z.infer<typeof accountSchema>): Account {
    const account: Account = {
        panelUrl: raw.panel_url,
        username: raw.username,
        password: raw.password
    }
    if (raw.enabled !== undefined) account.enabled = raw.enabled
    if (raw.on_banned && raw.on_banned.trim()) account.onBanned = raw.on_banned
    if (raw.proxy) account.proxy = { ...raw.proxy }
    return Object.freeze(account)
}

function toMarkers(raw: RawConfig['markers']): ConfigMarkers {
    return {
        banned: raw?.banned ?? DEFAULT_MARKERS.banned,
        loggedIn: raw?.logged_in ?? DEFAULT_MARKERS.loggedIn,
        dashboardPaths: raw?.dashboard_paths ?? DEFAULT_MARKERS.dashboardPaths,
        loginForm: raw?.login_form ?? DEFAULT_MARKERS.loginForm,
        invalidCredentials: raw?.invalid_credentials ?? DEFAULT_MARKERS.invalidCredentials,
        validity: raw?.validity ?? DEFAULT_MARKERS.validity
    }
}

/**
 * Validate an already parsed YAML document and normalize it into the camelCase Config.
 * Accounts with `enabled: false` are dropped here.
 */
export function parseConfig(raw: unknown): Config {
    const parsed = configSchema.safeParse(raw ?? {})
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`)
        throw new ConfigError('Invalid configuration', issues)
    }

    const settings = settingsSchema.parse(parsed.data.settings ?? {})

    return {
        settings: {
            timeout: settings.timeout,
            retryCount: settings.retry_count,
            retryDelay: settings.retry_delay,
            callbackTimeout: settings.callback_timeout,
            logFile: settings.log_file ?? DEFAULT_LOG_FILE
        },
        markers: toMarkers(parsed.data.markers),
        accounts: parsed.data.accounts.map(toAccount).filter(acc => acc.enabled !== false)
    }
}

/**
 * Resolve the config file. Absolute paths are used as-is; relative ones are searched in
 * the working directory first, then in the package root (one level above src/ or dist/).
 */
export function resolveConfigPath(configPath: string): string {
    if (path.isAbsolute(configPath)) return configPath

    const candidates = [
        path.join(process.cwd(), configPath),
        path.join(__dirname, '../../', configPath)
    ]
    for (const p of candidates) {
        if (fs.existsSync(p)) return p
    }
    return candidates[0] ?? configPath
}

export function loadConfig(configPath: string): Config {
    const file = resolveConfigPath(configPath)
    if (!fs.existsSync(file)) {
        throw new ConfigError(`Config file not found: ${file}`)
    }

    let raw: unknown
    try {
        const text = fs.readFileSync(file, 'utf-8').replace(/^\uFEFF/, '') // strip BOM if present
        raw = parseYaml(text)
    } catch (error) {
        throw new ConfigError(`Config file ${file} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`)
    }

    return parseConfig(raw)
}
