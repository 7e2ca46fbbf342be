import { describe, it, expect } from 'vitest';
import { isTracingEnabled, loadConfigFromEnv, parseRedactKeys } from '../../../src/config/env.js';

describe('Environment config', () => {
    describe('parseRedactKeys', () => {
        it('should split, trim and drop empty entries', () => {
            expect(parseRedactKeys(' password, token,,card ')).toEqual(['password', 'token', 'card']);
        });

        it('should return an empty list for undefined', () => {
            expect(parseRedactKeys(undefined)).toEqual([]);
        });
    });

    describe('isTracingEnabled', () => {
        it('should default to enabled', () => {
            expect(isTracingEnabled(undefined, {})).toBe(true);
        });

        it('should read TRACE_LOGGER_ENABLED case-insensitively', () => {
            expect(isTracingEnabled(undefined, { TRACE_LOGGER_ENABLED: 'FALSE' })).toBe(false);
            expect(isTracingEnabled(undefined, { TRACE_LOGGER_ENABLED: 'True' })).toBe(true);
        });

        it('should prefer the explicit flag', () => {
            expect(isTracingEnabled(false, { TRACE_LOGGER_ENABLED: 'true' })).toBe(false);
        });
    });

    describe('loadConfigFromEnv', () => {
        it('should fall back to defaults', () => {
            expect(loadConfigFromEnv({}, {})).toEqual({
                serviceName: 'unknown_service',
                environment: 'local',
                apiUrl: 'http://internal-api:8005',
                redactKeys: [],
            });
        });

        it('should read environment variables', () => {
            const config = loadConfigFromEnv(
                {},
                {
                    TRACE_LOGGER_SERVICE_NAME: 'orders',
                    ENV: 'staging',
                    INTERNAL_API_BASE_URL: 'http://internal.test',
                    TRACE_LOGGER_REDACT_KEYS: 'password,token',
                },
            );

            expect(config).toEqual({
                serviceName: 'orders',
                environment: 'staging',
                apiUrl: 'http://internal.test',
                redactKeys: ['password', 'token'],
            });
        });

        it('should prefer TRACE_LOGGER_API_URL over INTERNAL_API_BASE_URL', () => {
            const config = loadConfigFromEnv(
                {},
                { TRACE_LOGGER_API_URL: 'http://collector.test', INTERNAL_API_BASE_URL: 'http://internal.test' },
            );

            expect(config.apiUrl).toBe('http://collector.test');
        });

        it('should prefer overrides over environment variables', () => {
            const config = loadConfigFromEnv(
                { serviceName: 'billing', redactKeys: 'ssn' },
                { TRACE_LOGGER_SERVICE_NAME: 'orders', TRACE_LOGGER_REDACT_KEYS: 'password' },
            );

            expect(config.serviceName).toBe('billing');
            expect(config.redactKeys).toEqual(['ssn']);
        });

        it('should use the fallback service name before the default', () => {
            expect(loadConfigFromEnv({ fallbackServiceName: 'order_service' }, {}).serviceName).toBe('order_service');
        });
    });
});
