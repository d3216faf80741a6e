import { describe, it, expect } from 'vitest'

import { CliError, parseArgs } from '../../../src/util/Cli'

describe('parseArgs', () => {
    it('should default to config.yaml', () => {
        expect(parseArgs([], {})).toEqual({ configPath: 'config.yaml', noLog: false, verbose: false, help: false })
    })

    it('should take the config path from CONFIG_PATH', () => {
        expect(parseArgs([], { CONFIG_PATH: '/etc/keepalive.yaml' }).configPath).toBe('/etc/keepalive.yaml')
    })

    it('should let the flag override CONFIG_PATH', () => {
        expect(parseArgs(['-c', 'local.yaml'], { CONFIG_PATH: '/etc/keepalive.yaml' }).configPath).toBe('local.yaml')
        expect(parseArgs(['--config=other.yaml'], {}).configPath).toBe('other.yaml')
    })

    it('should read the boolean flags', () => {
        expect(parseArgs(['--no-log', '-v', '--help'], {})).toEqual({ configPath: 'config.yaml', noLog: true, verbose: true, help: true })
    })

    it('should reject a missing config value', () => {
        expect(() => parseArgs(['--config'], {})).toThrow(new CliError('--config requires a path'))
        expect(() => parseArgs(['-c', '-v'], {})).toThrow('-c requires a path')
        expect(() => parseArgs(['--config='], {})).toThrow('--config requires a path')
    })

    it('should reject unknown arguments', () => {
        expect(() => parseArgs(['extra'], {})).toThrow(CliError)
        expect(() => parseArgs(['extra'], {})).toThrow('Unknown argument: extra')
    })
})
