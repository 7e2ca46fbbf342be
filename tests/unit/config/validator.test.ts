import { describe, it, expect } from 'vitest';
import { ConfigValidator } from '../../../src/config/validator.js';
import type { CaptureRequestOptions, TraceLoggerConfig } from '../../../src/config/types.js';
import { ErrorCode, ValidationError } from '../../../src/errors/index.js';

describe('Config Validator', () => {
    describe('validateTraceLoggerConfig', () => {
        it('should accept valid minimal config', () => {
            const config: TraceLoggerConfig = {
                serviceName: 'payments',
                environment: 'prod',
            };

            expect(() => ConfigValidator.validateTraceLoggerConfig(config)).not.toThrow();
        });

        it('should accept empty strings for required fields', () => {
            const config: TraceLoggerConfig = {
                serviceName: '',
                environment: '',
            };

            expect(() => ConfigValidator.validateTraceLoggerConfig(config)).not.toThrow();
        });

        it('should reject a missing serviceName', () => {
            const config = { environment: 'prod' } as TraceLoggerConfig;

            expect(() => ConfigValidator.validateTraceLoggerConfig(config)).toThrow(ValidationError);
            expect(() => ConfigValidator.validateTraceLoggerConfig(config)).toThrow('serviceName is required');
        });

        it('should reject a missing environment', () => {
            const config = { serviceName: 'payments' } as TraceLoggerConfig;

            expect(() => ConfigValidator.validateTraceLoggerConfig(config)).toThrow('environment is required');
        });

        it('should reject non-string redact keys', () => {
            const config = {
                serviceName: 'payments',
                environment: 'prod',
                redactKeys: ['password', 42],
            } as unknown as TraceLoggerConfig;

            expect(() => ConfigValidator.validateTraceLoggerConfig(config)).toThrow(
                'Redact key at index 1 must be a string',
            );
        });

        it('should tag config failures with INVALID_CONFIG', () => {
            const config = { environment: 'prod' } as TraceLoggerConfig;

            try {
                ConfigValidator.validateTraceLoggerConfig(config);
                expect.unreachable();
            } catch (error) {
                expect(error).toBeInstanceOf(ValidationError);
                expect(error).toMatchObject({ code: ErrorCode.INVALID_CONFIG });
            }
        });
    });

    describe('resolveConfig', () => {
        it('should apply defaults and strip the trailing slash of apiUrl', () => {
            const resolved = ConfigValidator.resolveConfig({
                serviceName: 'payments',
                environment: 'prod',
                apiUrl: 'http://collector.test/',
            });

            expect(resolved).toEqual({
                serviceName: 'payments',
                environment: 'prod',
                apiUrl: 'http://collector.test',
                redactKeys: [],
                enableConsoleFallback: true,
                enableMetrics: false,
            });
            expect(Object.isFrozen(resolved)).toBe(true);
            expect(Object.isFrozen(resolved.redactKeys)).toBe(true);
        });
    });

    describe('validateCaptureOptions', () => {
        const valid: CaptureRequestOptions = {
            direction: 'outbound',
            route: '/v1/ledger',
            method: 'GET',
        };

        it('should accept required fields only', () => {
            expect(() => ConfigValidator.validateCaptureOptions(valid)).not.toThrow();
        });

        it('should reject an unknown direction', () => {
            const options = { ...valid, direction: 'sideways' } as unknown as CaptureRequestOptions;

            expect(() => ConfigValidator.validateCaptureOptions(options)).toThrow(
                'direction must be one of: inbound, outbound',
            );
        });

        it('should reject a missing route', () => {
            const options = { direction: 'inbound', method: 'GET' } as CaptureRequestOptions;

            expect(() => ConfigValidator.validateCaptureOptions(options)).toThrow('route is required');
        });

        it('should reject a non-string caller id', () => {
            const options = { ...valid, callerUserId: 7 } as unknown as CaptureRequestOptions;

            expect(() => ConfigValidator.validateCaptureOptions(options)).toThrow('callerUserId must be a string');
        });
    });
});
