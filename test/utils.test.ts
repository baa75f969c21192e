import { TransportError } from '../src/errors';
import { err, isFatalLinkError, ok, roundTo, toErrorMessage, withTimeout } from '../src/utils';

describe('utils', () => {
    describe('Result helpers', () => {
        test('ok and err tag the value', () => {
            expect(ok(3)).toEqual({ ok: true, value: 3 });
            expect(err('bad')).toEqual({ ok: false, error: 'bad' });
        });
    });

    describe('toErrorMessage', () => {
        test('uses the message of an Error', () => {
            expect(toErrorMessage(new Error('boom'))).toBe('boom');
        });
        test('stringifies anything else', () => {
            expect(toErrorMessage('plain')).toBe('plain');
            expect(toErrorMessage(42)).toBe('42');
        });
    });

    describe('isFatalLinkError', () => {
        test('recognises errors that leave the port unusable', () => {
            expect(isFatalLinkError(new Error('Port Not Open'))).toBe(true);
            expect(isFatalLinkError(new Error('Error: EACCES: permission denied, open /dev/ttyUSB0'))).toBe(true);
            expect(isFatalLinkError(new Error('write EPIPE'))).toBe(true);
        });
        test('treats timeouts and Modbus exceptions as recoverable', () => {
            expect(isFatalLinkError(new Error('Timed out'))).toBe(false);
            expect(isFatalLinkError(new Error('Modbus exception 2: Illegal data address'))).toBe(false);
        });
    });

    describe('withTimeout', () => {
        test('resolves with the operation result', async () => {
            await expect(withTimeout(Promise.resolve('done'), 50, 'read')).resolves.toBe('done');
        });
        test('rejects with a TransportError when the timer wins', async () => {
            const never = new Promise<string>(() => undefined);
            const result = withTimeout(never, 10, 'read');
            await expect(result).rejects.toBeInstanceOf(TransportError);
            await expect(result).rejects.toThrow('Transport read failed: timed out after 10ms');
        });
        test('passes the operation error through', async () => {
            await expect(withTimeout(Promise.reject(new Error('CRC')), 50, 'read')).rejects.toThrow('CRC');
        });
    });

    describe('roundTo', () => {
        test('rounds to the given decimals', () => {
            expect(roundTo(77.7777, 2)).toBe(77.78);
            expect(roundTo(33.33333, 1)).toBe(33.3);
            expect(roundTo(12, 0)).toBe(12);
        });
    });
});
