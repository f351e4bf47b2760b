import { textToBytes } from '@restbind/http-api';
import {
    BlockingTransport,
    NonBlockingTransport,
    RawResponse,
    TransportRequest,
} from '../transports/Transport';

export function jsonResponse(url: string, body: unknown, status = 200, statusText = 'OK'): RawResponse {
    return {
        status,
        statusText,
        headers: { 'content-type': 'application/json' },
        body: textToBytes(JSON.stringify(body)),
        url,
    };
}

export function textResponse(url: string, text: string, status = 200, statusText = 'OK'): RawResponse {
    return { status, statusText, headers: { 'content-type': 'text/plain' }, body: textToBytes(text), url };
}

export function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * In-process blocking transport answering from a handler.
 */
export class FakeBlockingTransport implements BlockingTransport {
    readonly sent: TransportRequest[] = [];
    readonly timeouts: number[] = [];
    closed = false;

    constructor(private readonly handler: (request: TransportRequest) => RawResponse) {}

    send(request: TransportRequest, timeoutMs: number): RawResponse {
        this.sent.push(request);
        this.timeouts.push(timeoutMs);
        return this.handler(request);
    }

    close(): void {
        this.closed = true;
    }
}

/**
 * In-process non-blocking transport answering from an async handler.
 * It never looks at the abort signal, like a transport that cannot be interrupted.
 */
export class FakeNonBlockingTransport implements NonBlockingTransport {
    readonly sent: TransportRequest[] = [];
    readonly signals: AbortSignal[] = [];
    readonly completed: string[] = [];
    closed = false;

    constructor(private readonly handler: (request: TransportRequest) => Promise<RawResponse>) {}

    async send(request: TransportRequest, signal: AbortSignal): Promise<RawResponse> {
        this.sent.push(request);
        this.signals.push(signal);
        const response = await this.handler(request);
        this.completed.push(request.url);
        return response;
    }

    async close(): Promise<void> {
        this.closed = true;
    }
}
