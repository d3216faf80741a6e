import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'fs'
import os from 'os'
import path from 'path'

import { createLogger } from '../../../src/util/Logger'
import { fakeSink } from '../../utils/test-helpers'

const LINE_PREFIX = String.raw`^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] \[PID: \d+\] `

function readLines(file: string): string[] {
    return fs.readFileSync(file, 'utf-8').trim().split('\n')
}

describe('createLogger', () => {
    let dir: string
    let logFile: string

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'keepalive-log-'))
        logFile = path.join(dir, 'nested', 'keepalive.log')
    })

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true })
    })

    it('should append plain lines to the log file', () => {
        const logger = createLogger({ logFile, console: fakeSink() })

        logger.log('panel1', 'LOGIN', 'Checking account alice...')
        logger.log('main', 'SUMMARY', 'Done', 'warn')

        const lines = readLines(logFile)
        expect(lines).toHaveLength(2)
        expect(lines[0]).toMatch(new RegExp(`${LINE_PREFIX}\\[LOG\\] panel1 \\[LOGIN\\] Checking account alice\\.\\.\\.$`))
        expect(lines[1]).toMatch(new RegExp(`${LINE_PREFIX}\\[WARN\\] MAIN \\[SUMMARY\\] Done$`))
    })

    it('should route console output by type', () => {
        const sink = fakeSink()
        const logger = createLogger({ console: sink })

        logger.log('panel1', 'ACCOUNT-NORMAL', 'alice: account is active', 'log', 'green')
        logger.log('panel1', 'LOGIN-FAILED', 'alice: login rejected', 'warn')
        logger.log('panel1', 'ACCOUNT-ERROR', 'alice: status unknown', 'error')

        expect(sink.log).toHaveBeenCalledTimes(1)
        expect(sink.warn).toHaveBeenCalledTimes(1)
        expect(sink.error).toHaveBeenCalledTimes(1)
        expect(sink.warn.mock.calls[0]?.[0]).toContain('alice: login rejected')
    })

    it('should keep debug lines off the console unless verbose', () => {
        const quiet = fakeSink()
        const loud = fakeSink()

        createLogger({ logFile, console: quiet }).log('panel1', 'LOGIN', 'Attempt 1/4 for alice', 'debug')
        createLogger({ console: loud, verbose: true }).log('panel1', 'LOGIN', 'Attempt 1/4 for alice', 'debug')

        expect(quiet.log).not.toHaveBeenCalled()
        expect(readLines(logFile)[0]).toMatch(new RegExp(`${LINE_PREFIX}\\[DEBUG\\] panel1 \\[LOGIN\\] Attempt 1/4 for alice$`))
        expect(loud.log).toHaveBeenCalledTimes(1)
    })

    it('should mask registered secrets', () => {
        const logger = createLogger({ logFile, console: fakeSink() })
        logger.addSecret('test-secret')

        logger.log('panel1', 'LOGIN', 'posted test-secret twice: test-secret')

        expect(readLines(logFile)[0]).toMatch(/ posted \*\*\* twice: \*\*\*$/)
    })

    it('should ignore secrets too short to mask', () => {
        const logger = createLogger({ logFile, console: fakeSink() })
        logger.addSecret('1')

        logger.log('panel1', 'LOGIN', 'Attempt 1/4 for alice')

        expect(readLines(logFile)[0]).toMatch(/ Attempt 1\/4 for alice$/)
    })

    it('should return an Error carrying the line for error logs', () => {
        const logger = createLogger({ console: fakeSink() })

        const result = logger.log('main', 'MAIN', 'fatal', 'error')
        const plain = logger.log('main', 'MAIN', 'fine')

        expect(result).toBeInstanceOf(Error)
        expect(result instanceof Error ? result.message : '').toMatch(new RegExp(`${LINE_PREFIX}\\[ERROR\\] MAIN \\[MAIN\\] fatal$`))
        expect(plain).toBeUndefined()
    })

    it('should disable the file sink once after a write failure', () => {
        const sink = fakeSink()
        const logger = createLogger({ logFile: dir, console: sink })

        logger.log('main', 'MAIN', 'first')
        logger.log('main', 'MAIN', 'second')

        expect(sink.error).toHaveBeenCalledTimes(1)
        expect(sink.error.mock.calls[0]?.[0]).toContain(`[Logger] Disabled file sink ${dir}`)
        expect(sink.log).toHaveBeenCalledTimes(2)
    })
})
