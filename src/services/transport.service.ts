import axios, { AxiosError } from 'axios';
import type { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import { RemoteServiceError, ResponseFormatError } from '../errors';
import type { RequestOptions } from '../types/iq.types';

// =============================================================================
// ReST Transport - JSON over HTTP to the results service
// =============================================================================

export type HttpMethod = 'get' | 'post' | 'put' | 'delete';

export interface TransportOptions {
    baseUrl: string;
    timeoutMs?: number; // 0 waits forever
    verbose?: boolean;
    adapter?: AxiosAdapter; // replaces the HTTP adapter, e.g. an in-process service in tests
}

export class IqTransport {
    readonly baseUrl: string;
    private readonly http: AxiosInstance;
    private readonly verbose: boolean;

    constructor(options: TransportOptions) {
        this.baseUrl = options.baseUrl;
        this.verbose = options.verbose ?? false;

        // Bodies are parsed here rather than by axios so that a non-JSON body
        // surfaces as an error instead of a bare string.
        this.http = axios.create({
            baseURL: options.baseUrl,
            timeout: options.timeoutMs ?? 0,
            headers: {
                'Content-Type': 'application/json',
            },
            responseType: 'text',
            transformResponse: [(data: unknown) => data],
            validateStatus: () => true,
            adapter: options.adapter,
        });
    }

    /**
     * Send a request to `<baseUrl>/<path>` and return the parsed JSON body
     */
    async execute(method: HttpMethod, path: string, payload?: unknown, options: RequestOptions = {}): Promise<unknown> {
        const response = await this.send(method, path, payload, options);
        return this.parseBody(response.data, method, path);
    }

    /**
     * HEAD carries no body, so only the status code comes back
     */
    async head(path: string, options: RequestOptions = {}): Promise<number> {
        const response = await this.send('head', path, undefined, options);
        return response.status;
    }

    private async send(
        method: HttpMethod | 'head',
        path: string,
        payload: unknown,
        options: RequestOptions
    ): Promise<AxiosResponse<unknown>> {
        const startTime = Date.now();

        try {
            const response = await this.http.request<unknown>({
                method,
                url: path,
                data: payload,
                signal: options.signal,
            });

            if (this.verbose) {
                console.log(
                    `[IqTransport] ${method.toUpperCase()} ${path} - ${response.status} (${Date.now() - startTime}ms)`
                );
            }

            if (response.status < 200 || response.status >= 300) {
                throw this.toServiceError(response);
            }

            return response;
        } catch (error) {
            console.error(`[IqTransport] ${method.toUpperCase()} ${path} failed:`, error instanceof Error ? error.message : error);
            throw error;
        }
    }

    private parseBody(data: unknown, method: HttpMethod, path: string): unknown {
        if (typeof data !== 'string') {
            return data ?? null;
        }
        if (data.trim() === '') {
            return null;
        }

        try {
            return JSON.parse(data);
        } catch (error) {
            throw new ResponseFormatError(`${method.toUpperCase()} ${path} returned a body that is not JSON`, error);
        }
    }

    /**
     * Prefer the service's own `message`; otherwise keep the HTTP failure as the cause
     */
    private toServiceError(response: AxiosResponse<unknown>): RemoteServiceError {
        const serviceMessage = extractServiceMessage(response.data);
        const httpError = new AxiosError(
            `Request failed with status code ${response.status}`,
            response.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
            response.config,
            response.request,
            response
        );

        return new RemoteServiceError(response.status, response.statusText, serviceMessage, httpError);
    }
}

function extractServiceMessage(data: unknown): string | null {
    let body: unknown = data;
    if (typeof data === 'string') {
        try {
            body = JSON.parse(data);
        } catch {
            return null;
        }
    }

    if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
        return body.message;
    }
    return null;
}
