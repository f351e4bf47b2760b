import { toError } from '@restbind/core-util';
import { TransportConnectError, TransportError, TransportReadError } from '@restbind/http-api';
import { NonBlockingTransport, RawResponse, TransportRequest } from './Transport';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Copies fetch headers into a plain record with lower-case names.
 */
export function headersToRecord(headers: Headers): Record<string, string> {
    const record: Record<string, string> = {};
    headers.forEach((value, name) => {
        record[name.toLowerCase()] = value;
    });
    return record;
}

/**
 * FetchTransport - Non-blocking transport on top of the global fetch.
 *
 * Connection failures become TransportConnectError; a body that breaks off
 * while being read becomes TransportReadError.
 */
export class FetchTransport implements NonBlockingTransport {
    private closed = false;

    constructor(private readonly fetchImpl: FetchLike = (url, init) => fetch(url, init)) {}

    async send(request: TransportRequest, signal: AbortSignal): Promise<RawResponse> {
        if (this.closed) {
            throw new TransportError(`Transport is closed; cannot send ${request.method} ${request.url}`);
        }

        let response: Response;
        try {
            response = await this.fetchImpl(request.url, {
                method: request.method,
                headers: { ...request.headers },
                body: request.body,
                signal,
            });
        } catch (err: unknown) {
            const error = toError(err);
            throw new TransportConnectError(`Cannot reach ${request.url}: ${error.message}`, error);
        }

        let body: Uint8Array;
        try {
            body = new Uint8Array(await response.arrayBuffer());
        } catch (err: unknown) {
            const error = toError(err);
            throw new TransportReadError(`Failed reading the response of ${request.url}: ${error.message}`, error);
        }

        return {
            status: response.status,
            statusText: response.statusText,
            headers: headersToRecord(response.headers),
            body,
            url: response.url || request.url,
        };
    }

    async close(): Promise<void> {
        this.closed = true;
    }
}
