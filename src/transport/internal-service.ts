/**
 * Internal Observability Service client
 *
 * Wraps axios with shared-secret authentication for calls to the internal
 * observability API. Base URL and secret come from the environment unless
 * overridden.
 */

import axios, { AxiosError, type AxiosInstance } from 'axios';
import { DEFAULTS, ENDPOINTS, ENV_VARS, ERROR_STATUS_THRESHOLD } from '../constants/index.js';
import { APIError, AuthenticationError, toError } from '../errors/index.js';
import { isErrorRecord, toPayload, type IngestionBatch, type TraceRecord } from '../models/trace-record.js';
import type { TraceTransport } from './types.js';

export interface InternalServiceOptions {
    /** Overrides INTERNAL_API_BASE_URL. */
    apiUrl?: string;
    /** Overrides INTERNAL_AUTH_SECRET. */
    authSecret?: string;
    /** @default 5000 */
    timeoutMs?: number;
    /** Pre-configured axios instance. */
    httpClient?: AxiosInstance;
    /** Environment to read defaults from. @default process.env */
    env?: Record<string, string | undefined>;
}

export class InternalObservabilityService implements TraceTransport {
    readonly baseUrl: string;
    private readonly authSecret?: string;
    private readonly http: AxiosInstance;

    constructor(options: InternalServiceOptions = {}) {
        const env = options.env ?? process.env;
        const baseUrl = options.apiUrl || env[ENV_VARS.API_BASE_URL] || DEFAULTS.API_URL;

        this.baseUrl = baseUrl.replace(/\/+$/, '');
        this.authSecret = options.authSecret ?? env[ENV_VARS.AUTH_SECRET];
        this.http =
            options.httpClient ??
            axios.create({
                timeout: options.timeoutMs ?? DEFAULTS.REQUEST_TIMEOUT_MS,
            });
    }

    async send(record: TraceRecord): Promise<void> {
        await this.sendLogs(toBatch(record));

        if (isErrorRecord(record, ERROR_STATUS_THRESHOLD)) {
            await this.sendErrorLogs(toBatch(record));
        }
    }

    async sendLogs(payload: IngestionBatch): Promise<void> {
        await this.call(ENDPOINTS.LOGS, payload);
    }

    async sendErrorLogs(payload: IngestionBatch): Promise<void> {
        await this.call(ENDPOINTS.ERROR_LOGS, payload);
    }

    private async call(path: string, payload: IngestionBatch): Promise<void> {
        if (!this.authSecret) {
            throw new AuthenticationError(`${ENV_VARS.AUTH_SECRET} is not set`, { path });
        }

        try {
            await this.http.post(path, payload, {
                baseURL: this.baseUrl,
                headers: {
                    Authorization: `Bearer ${this.authSecret}`,
                    'Content-Type': 'application/json',
                },
            });
        } catch (error) {
            if (error instanceof AxiosError) {
                const status = error.response?.status;
                throw new APIError(
                    status
                        ? `Observability API responded ${status} for POST ${path}`
                        : `Observability API request failed for POST ${path}: ${error.message}`,
                    status,
                    error,
                    { path, code: error.code },
                );
            }
            throw toError(error);
        }
    }
}

function toBatch(record: TraceRecord): IngestionBatch {
    return {
        records: [toPayload(record)],
        ingestion_version: DEFAULTS.INGESTION_VERSION,
    };
}
