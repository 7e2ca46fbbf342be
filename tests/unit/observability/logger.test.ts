import { describe, it, expect } from 'vitest';
import { Logger } from '@aws-lambda-powertools/logger';
import { Metrics } from '@aws-lambda-powertools/metrics';
import { createLogger, parseLogLevel } from '../../../src/observability/logger.js';
import { buildDefaultDimensions, createMetrics } from '../../../src/observability/metrics.js';

describe('observability', () => {
    describe('parseLogLevel', () => {
        it('should accept level names in any case', () => {
            expect(parseLogLevel('debug')).toBe('DEBUG');
            expect(parseLogLevel('Warn')).toBe('WARN');
        });

        it('should reject unknown or missing levels', () => {
            expect(parseLogLevel('verbose')).toBeUndefined();
            expect(parseLogLevel(undefined)).toBeUndefined();
        });
    });

    describe('createLogger', () => {
        it('should create a Powertools logger at the requested level', () => {
            const logger = createLogger({ serviceName: 'payments', logLevel: 'ERROR' });

            expect(logger).toBeInstanceOf(Logger);
            expect(logger.getLevelName()).toBe('ERROR');
        });
    });

    describe('createMetrics', () => {
        it('should create a Powertools metrics instance', () => {
            expect(createMetrics({ serviceName: 'payments', environment: 'staging' })).toBeInstanceOf(Metrics);
        });
    });

    describe('buildDefaultDimensions', () => {
        it('should dimension counters by environment', () => {
            expect(buildDefaultDimensions({ serviceName: 'payments', environment: 'staging' })).toEqual({
                environment: 'staging',
            });
        });

        it('should let explicit dimensions override the environment', () => {
            expect(
                buildDefaultDimensions({
                    serviceName: 'payments',
                    environment: 'staging',
                    defaultDimensions: { environment: 'canary', region: 'eu-west-1' },
                }),
            ).toEqual({ environment: 'canary', region: 'eu-west-1' });
        });

        it('should be empty without an environment', () => {
            expect(buildDefaultDimensions({ serviceName: 'payments' })).toEqual({});
        });
    });
});
