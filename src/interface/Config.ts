// src/interface/Config.ts

import { Account } from './Account'

export interface Config {
    settings: ConfigSettings;

    // Marker lists used by the status classifier
    markers: ConfigMarkers;

    // Accounts in the order they are checked (disabled ones already removed)
    accounts: Account[];
}

/* ---------------------------
   Sub-interfaces & helpers
   --------------------------- */

export interface ConfigSettings {
    timeout: number; // seconds per HTTP request
    retryCount: number; // retries after the first attempt
    retryDelay: number; // seconds, base of the backoff between attempts
    callbackTimeout: number; // seconds before an on_banned command is killed
    logFile?: string; // log file path, undefined disables the file sink
}

export interface ConfigMarkers {
    banned: string[]; // text shown on suspended accounts
    loggedIn: string[]; // text only present once logged in
    dashboardPaths: string[]; // effective URL path prefixes of the authenticated area
    loginForm: string[]; // text of the login form itself
    invalidCredentials: string[]; // text of the rejected-credentials message
    validity: string[]; // labels preceding the account expiry date
}
