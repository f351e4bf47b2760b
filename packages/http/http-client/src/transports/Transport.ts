import { HttpMethod } from '@restbind/http-api';

/**
 * What a transport needs to put one request on the wire.
 */
export interface TransportRequest {
    readonly method: HttpMethod;
    readonly url: string;
    readonly headers: Readonly<Record<string, string>>;
    readonly body?: Uint8Array;
}

/**
 * RawResponse - Status line, headers and body bytes as received.
 * Header names are lower-case.
 */
export interface RawResponse {
    readonly status: number;
    readonly statusText: string;
    readonly headers: Readonly<Record<string, string>>;
    readonly body: Uint8Array;
    readonly url: string;
}

/**
 * BlockingTransport - Sends on the caller's stack and returns when the response is complete.
 * Must throw TransportTimeoutError once timeoutMs has elapsed.
 */
export interface BlockingTransport {
    send(request: TransportRequest, timeoutMs: number): RawResponse;
    close(): void;
}

/**
 * NonBlockingTransport - Sends cooperatively; the returned promise is the suspension point.
 * Should stop work when the signal aborts. The request layer stops waiting either way.
 */
export interface NonBlockingTransport {
    send(request: TransportRequest, signal: AbortSignal): Promise<RawResponse>;
    close(): Promise<void>;
}

export type BlockingTransportFactory = () => BlockingTransport;
export type NonBlockingTransportFactory = () => NonBlockingTransport;
