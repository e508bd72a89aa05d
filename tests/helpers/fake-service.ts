import type { AxiosAdapter, AxiosResponse, GenericAbortSignal, InternalAxiosRequestConfig } from 'axios';

// =============================================================================
// In-process stand-in for the results service (axios adapter)
// =============================================================================

export interface RecordedRequest {
    method: string;
    url: string;
    body: unknown;
    signal: GenericAbortSignal | null;
}

export interface FakeReply {
    status?: number;
    statusText?: string;
    body?: unknown; // serialized as JSON
    rawBody?: string; // sent as is
}

export type FakeHandler = (request: RecordedRequest) => FakeReply;

export class FakeIqService {
    readonly requests: RecordedRequest[] = [];
    private readonly routes = new Map<string, FakeHandler>();

    on(method: string, url: string, reply: FakeReply | FakeHandler): this {
        const handler: FakeHandler = typeof reply === 'function' ? reply : () => reply;
        this.routes.set(`${method.toLowerCase()} ${url}`, handler);
        return this;
    }

    requestsTo(method: string, url: string): RecordedRequest[] {
        return this.requests.filter((request) => request.method === method.toLowerCase() && request.url === url);
    }

    readonly adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
        const request: RecordedRequest = {
            method: (config.method ?? 'get').toLowerCase(),
            url: config.url ?? '',
            body: typeof config.data === 'string' ? JSON.parse(config.data) : (config.data ?? null),
            signal: config.signal ?? null,
        };
        this.requests.push(request);

        const handler = this.routes.get(`${request.method} ${request.url}`);
        const reply: FakeReply = handler
            ? handler(request)
            : { status: 404, body: { message: `No route for ${request.method.toUpperCase()} ${request.url}` } };

        const status = reply.status ?? 200;
        return {
            data: reply.rawBody ?? (reply.body === undefined ? '' : JSON.stringify(reply.body)),
            status,
            statusText: reply.statusText ?? (status < 300 ? 'OK' : 'Error'),
            headers: {},
            config,
            request: {},
        };
    };
}
