import { describe, it, expect } from 'vitest';
import { fail, fromError, normalizeResult, ok, toCommandResult } from '../../src/commands/result.js';
import { CommandNotFoundError } from '../../src/errors.js';

describe('ok / fail', () => {
    it('builds a success without suggestions by default', () => {
        expect(ok('demo:run', { n: 1 })).toEqual({ success: true, output: { n: 1 }, error: null, command: 'demo:run' });
    });

    it('drops an empty suggestion list', () => {
        expect('suggestions' in fail('demo:run', 'nope', { suggestions: [] })).toBe(false);
    });

    it('keeps code, output and suggestions on a failure', () => {
        expect(fail('demo:run', 'nope', { code: 'TIMEOUT', output: 'partial', suggestions: ['retry later'] })).toEqual({
            success: false,
            output: 'partial',
            error: 'nope',
            command: 'demo:run',
            code: 'TIMEOUT',
            suggestions: ['retry later'],
        });
    });
});

describe('fromError', () => {
    it('carries the taxonomy code of an AssistantError', () => {
        const result = fromError('a:b', new CommandNotFoundError('a:b'));

        expect(result.error).toBe('Command not found: a:b');
        expect(result.code).toBe('COMMAND_NOT_FOUND');
    });

    it('has no code for a plain error', () => {
        const result = fromError('a:b', new Error('kaput'));

        expect(result.error).toBe('kaput');
        expect(result.code).toBeUndefined();
    });

    it('stringifies thrown non-errors', () => {
        expect(fromError('a:b', 42).error).toBe('42');
    });
});

describe('toCommandResult', () => {
    it('uses stdout as output by default', () => {
        const result = toCommandResult({
            success: true, error: null, command: 'git status', stdout: 'clean', stderr: '', exitCode: 0, durationMs: 5,
        });

        expect(result).toEqual({ success: true, output: 'clean', error: null, command: 'git status' });
    });

    it('maps a process failure with its code', () => {
        const result = toCommandResult({
            success: false, error: 'fatal: not a git repository', code: 'NON_ZERO_EXIT',
            command: 'git status', stdout: '', stderr: 'fatal: not a git repository', exitCode: 128, durationMs: 5,
        }, undefined, ['Run github:init-repo first']);

        expect(result).toEqual({
            success: false,
            output: null,
            error: 'fatal: not a git repository',
            command: 'git status',
            code: 'NON_ZERO_EXIT',
            suggestions: ['Run github:init-repo first'],
        });
    });
});

describe('normalizeResult', () => {
    it('passes a well-formed result through', () => {
        const result = ok('demo:run', ['a', 'b'], ['next step']);

        expect(normalizeResult('demo:run', result)).toEqual(result);
    });

    it('treats an object with a string error as a failure', () => {
        const result = normalizeResult('demo:run', { error: 'bad input', suggestions: ['check the path'], path: '/tmp/x' });

        expect(result).toEqual({
            success: false,
            output: { path: '/tmp/x' },
            error: 'bad input',
            command: 'demo:run',
            suggestions: ['check the path'],
        });
    });

    it('leaves output null when the error object has nothing else', () => {
        const result = normalizeResult('demo:run', { error: 'bad input' });

        expect(result.success).toBe(false);
        expect(result.output).toBeNull();
    });

    it('treats success: false as a failure even without a string error', () => {
        expect(normalizeResult('ext:cmd', { success: false, message: 'disk full', free: 0 })).toEqual({
            success: false,
            output: { free: 0 },
            error: 'disk full',
            command: 'ext:cmd',
        });
        expect(normalizeResult('ext:cmd', { success: false, error: null })).toEqual({
            success: false,
            output: null,
            error: 'Command failed',
            command: 'ext:cmd',
        });
    });

    it('does not carry the success flag into the output of a failure', () => {
        expect(normalizeResult('ext:cmd', { success: false, error: 'bad input' })).toEqual({
            success: false,
            output: null,
            error: 'bad input',
            command: 'ext:cmd',
        });
    });

    it('wraps any other value as successful output', () => {
        expect(normalizeResult('demo:run', 'plain text')).toEqual(ok('demo:run', 'plain text'));
        expect(normalizeResult('demo:run', { files: 3 })).toEqual(ok('demo:run', { files: 3 }));
    });

    it('maps undefined to a null output', () => {
        expect(normalizeResult('demo:run', undefined).output).toBeNull();
    });
});
