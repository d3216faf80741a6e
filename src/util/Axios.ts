import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios'
import type { Agent } from 'http'
import { HttpProxyAgent } from 'http-proxy-agent'
import { HttpsProxyAgent } from 'https-proxy-agent'
import { SocksProxyAgent } from 'socks-proxy-agent'
import { AccountProxy } from '../interface/Account'

export interface HttpRequester {
    request(config: AxiosRequestConfig, proxy?: AccountProxy): Promise<AxiosResponse<string>>
}

interface ProxyAgents {
    httpAgent: Agent
    httpsAgent: Agent
}

class AxiosClient implements HttpRequester {
    private instance: AxiosInstance
    private agents = new Map<string, ProxyAgents>()

    constructor() {
        this.instance = axios.create()

        // when using custom agents, disable axios built-in proxy handling
        // otherwise axios's proxy config may conflict with the agent
        this.instance.defaults.proxy = false
    }

    /**
     * Normalize a proxy entry into a URL string:
     *  - accepts scheme-less host (assumes http)
     *  - normalizes socks5h:// -> socks5://
     *  - encodes username/password into the proxy URL
     */
    static proxyUrl(proxyConfig: AccountProxy): string {
        const { url, port, username, password } = proxyConfig
        let urlStr = String(url || '')

        // If user provided only host/IP without scheme, assume http
        if (!/^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//.test(urlStr)) {
            urlStr = `http://${urlStr}`
        }

        urlStr = urlStr.replace(/^socks5h:\/\//i, 'socks5://')

        const parsed = new URL(urlStr)

        if (port) parsed.port = String(port)

        const user = username || decodeURIComponent(parsed.username)
        const pass = password || decodeURIComponent(parsed.password)
        const cred = user ? `${encodeURIComponent(user)}:${encodeURIComponent(pass)}@` : ''

        const hostPort = `${parsed.hostname}${parsed.port ? `:${parsed.port}` : ''}`
        // parsed.protocol includes trailing ":" (e.g. "http:")
        return `${parsed.protocol}//${cred}${hostPort}`
    }

    private getAgents(proxyConfig: AccountProxy): ProxyAgents {
        const proxyUrl = AxiosClient.proxyUrl(proxyConfig)
        const cached = this.agents.get(proxyUrl)
        if (cached) return cached

        const protocol = new URL(proxyUrl).protocol
        let agents: ProxyAgents
        if (protocol === 'http:' || protocol === 'https:') {
            agents = {
                httpAgent: new HttpProxyAgent(proxyUrl),
                httpsAgent: new HttpsProxyAgent(proxyUrl)
            }
        } else if (protocol.startsWith('socks')) {
            const socks = new SocksProxyAgent(proxyUrl)
            agents = { httpAgent: socks, httpsAgent: socks }
        } else {
            throw new Error(`Unsupported proxy protocol: ${protocol}`)
        }

        this.agents.set(proxyUrl, agents)
        return agents
    }

    // Single request, no retries: attempts are counted by the caller
    public async request(config: AxiosRequestConfig, proxy?: AccountProxy): Promise<AxiosResponse<string>> {
        if (proxy && proxy.url) {
            const { httpAgent, httpsAgent } = this.getAgents(proxy)
            return this.instance.request<string>({ ...config, httpAgent, httpsAgent })
        }
        return this.instance.request<string>(config)
    }
}

export default AxiosClient
