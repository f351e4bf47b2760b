import { toError } from '@restbind/core-util';
import { bytesToText, typeName } from '@restbind/http-api';
import { DEFAULT_SECURED_HEADERS } from './ClientConfig';
import { HttpRequestSpec } from './RequestBuilder';
import { RawResponse } from './transports/Transport';

/**
 * LogApiCall - Logs each call made through a scope.
 *
 * Logging format patterns:
 * - [API-CLIENT-req] Todo GET http://host/todos/1 request=... headers={...}
 * - [API-CLIENT-resp-SUCCESS] Todo GET http://host/todos/1 status=200 bytes=37
 * - [API-CLIENT-resp-OTHER] Todo GET http://host/todos/1 status=404  (4xx, the caller's mistake)
 * - [API-CLIENT-resp-FAIL] Todo GET http://host/todos/1 status=500  (5xx, or errorType=... for thrown errors)
 */
export class LogApiCall {
    private readonly secured: ReadonlySet<string>;

    constructor(
        private readonly enabled = true,
        securedHeaders: readonly string[] = DEFAULT_SECURED_HEADERS,
    ) {
        this.secured = new Set(securedHeaders.map((name) => name.toLowerCase()));
    }

    /**
     * Execute a blocking call with logging around it.
     */
    executeSync(request: HttpRequestSpec, method: () => RawResponse): RawResponse {
        this.logRequest(request);
        try {
            const response = method();
            this.logResponse(request, response);
            return response;
        } catch (err: unknown) {
            const error = toError(err);
            this.logFailure(request, error);
            throw error;
        }
    }

    /**
     * Execute a non-blocking call with logging around it.
     */
    async execute(request: HttpRequestSpec, method: () => Promise<RawResponse>): Promise<RawResponse> {
        this.logRequest(request);
        try {
            const response = await method();
            this.logResponse(request, response);
            return response;
        } catch (err: unknown) {
            const error = toError(err);
            this.logFailure(request, error);
            throw error;
        }
    }

    /**
     * Header map for logs, secured values masked.
     */
    maskHeaders(headers: Readonly<Record<string, string>>): Record<string, string> {
        const result: Record<string, string> = {};
        for (const [name, value] of Object.entries(headers)) {
            result[name] = this.secured.has(name.toLowerCase()) ? LogApiCall.maskSecureValue(value) : value;
        }
        return result;
    }

    /**
     * Mask a secure header value based on its length.
     */
    static maskSecureValue(value: string): string {
        const len = value.length;

        if (len < 8) {
            return '<secure key too short to log>';
        } else if (len <= 15) {
            return `${value.substring(0, 2)}...`;
        } else {
            return `${value.substring(0, 3)}...${value.substring(len - 3)}`;
        }
    }

    /**
     * 4xx statuses are the caller's mistakes, not failures.
     */
    static isUserError(status: number): boolean {
        return status >= 400 && status < 500;
    }

    private describe(request: HttpRequestSpec): string {
        return `${typeName(request.route.type)} ${request.method} ${request.url}`;
    }

    private logRequest(request: HttpRequestSpec): void {
        if (!this.enabled) {
            return;
        }
        const body = request.body === undefined ? 'none' : bytesToText(request.body);
        console.log(
            `[API-CLIENT-req] ${this.describe(request)} request=${body} headers=${JSON.stringify(this.maskHeaders(request.headers))}`,
        );
    }

    private logResponse(request: HttpRequestSpec, response: RawResponse): void {
        if (!this.enabled) {
            return;
        }
        const outcome = `${this.describe(request)} status=${response.status} bytes=${response.body.byteLength}`;
        if (LogApiCall.isUserError(response.status)) {
            console.log(`[API-CLIENT-resp-OTHER] ${outcome}`);
        } else if (response.status >= 500) {
            console.error(`[API-CLIENT-resp-FAIL] ${outcome}`);
        } else {
            console.log(`[API-CLIENT-resp-SUCCESS] ${outcome}`);
        }
    }

    private logFailure(request: HttpRequestSpec, error: Error): void {
        if (!this.enabled) {
            return;
        }
        console.error(
            `[API-CLIENT-resp-FAIL] ${this.describe(request)} errorType=${error.constructor.name} error=${error.message}`,
        );
    }
}
