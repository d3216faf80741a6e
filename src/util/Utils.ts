export type Sleeper = (ms: number) => Promise<void>

export default class Util {

    async wait(ms: number): Promise<void> {
        return new Promise<void>((resolve) => {
            setTimeout(resolve, ms)
        })
    }

    /** "panel12" for https://panel12.example.com, falls back to the raw string. */
    panelLabel(panelUrl: string): string {
        try {
            const host = new URL(panelUrl).hostname
            return host.split('.')[0] || host
        } catch {
            return panelUrl
        }
    }

    collapseWhitespace(text: string): string {
        return text.replace(/\s+/g, ' ').trim()
    }

    escapeRegExp(text: string): string {
        return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
    }
}

export function shortErr(e: unknown): string {
    if (e == null) return 'unknown'
    if (e instanceof Error) return e.message.substring(0, 120)
    const s = String(e)
    return s.substring(0, 120)
}
