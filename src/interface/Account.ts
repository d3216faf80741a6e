export interface Account {
    /** Enable/disable this account (if false, account will be skipped during execution) */
    enabled?: boolean;

    /** Base URL of the panel, e.g. https://panel1.example.com */
    panelUrl: string;

    /** Panel login name */
    username: string;

    /** Account password */
    password: string;

    /** Shell command run when the account is found banned */
    onBanned?: string;

    /** Proxy settings used for this account's panel requests */
    proxy?: AccountProxy;
}

export interface AccountProxy {
    /** Proxy host (hostname, IP or full URL with scheme) */
    url: string;

    /** Proxy port */
    port?: number;

    /** Proxy authentication username */
    username?: string;

    /** Proxy authentication password */
    password?: string;
}
