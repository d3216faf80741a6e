#!/usr/bin/env node
import { main } from './index'

process.on('unhandledRejection', (reason) => {
    console.error('[FATAL] UnhandledRejection: ' + (reason instanceof Error ? reason.message : String(reason)))
    process.exit(1)
})
process.on('uncaughtException', (err) => {
    console.error('[FATAL] UncaughtException: ' + err.message)
    process.exit(1)
})

main().then((code) => {
    process.exitCode = code
}).catch((error) => {
    console.error(`[FATAL] Error running keepalive: ${error instanceof Error ? error.message : String(error)}`)
    process.exitCode = 1
})
