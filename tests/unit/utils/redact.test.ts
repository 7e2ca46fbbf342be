import { describe, it, expect } from 'vitest';
import { redactPayload } from '../../../src/utils/redact.js';

describe('redactPayload', () => {
    it('should redact matching keys case-insensitively', () => {
        const result = redactPayload({ user: 'ada', Password: 'test-secret' }, ['password']);

        expect(result).toEqual({ user: 'ada', Password: '<<redacted>>' });
    });

    it('should redact nested objects and arrays', () => {
        const payload = {
            cards: [{ number: '4111', holder: 'ada' }],
            auth: { token: 'test-token', scope: 'read' },
        };

        expect(redactPayload(payload, ['NUMBER', 'token'])).toEqual({
            cards: [{ number: '<<redacted>>', holder: 'ada' }],
            auth: { token: '<<redacted>>', scope: 'read' },
        });
    });

    it('should replace a whole nested object when its key matches', () => {
        expect(redactPayload({ credentials: { user: 'ada' } }, ['credentials'])).toEqual({
            credentials: '<<redacted>>',
        });
    });

    it('should replace references back to an enclosing object', () => {
        const payload: Record<string, unknown> = { password: 'test-secret', items: [] };
        payload.parent = payload;
        payload.items = [payload, { note: 'kept' }];

        expect(redactPayload(payload, ['password'])).toEqual({
            password: '<<redacted>>',
            items: ['<<circular>>', { note: 'kept' }],
            parent: '<<circular>>',
        });
    });

    it('should copy an object referenced twice without a cycle', () => {
        const address = { city: 'Lyon' };

        expect(redactPayload({ billing: address, shipping: address }, ['password'])).toEqual({
            billing: { city: 'Lyon' },
            shipping: { city: 'Lyon' },
        });
    });

    it('should not modify the input', () => {
        const payload = { password: 'test-secret' };
        redactPayload(payload, ['password']);

        expect(payload.password).toBe('test-secret');
    });

    it('should return non-object payloads unchanged', () => {
        const list = [{ password: 'test-secret' }];

        expect(redactPayload(list, ['password'])).toBe(list);
        expect(redactPayload('plain', ['password'])).toBe('plain');
    });

    it('should support custom replacement text', () => {
        expect(redactPayload({ pin: '1234' }, ['pin'], { replacementText: '***' })).toEqual({ pin: '***' });
    });
});
