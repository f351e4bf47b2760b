import { toError } from '@restbind/core-util';
import {
    HttpMethod,
    PathParams,
    PathParamValue,
    PathTemplate,
    RequestBuildError,
    RouteTemplateError,
} from '@restbind/http-api';
import { ClientRouter, Route } from '@restbind/http-routing';
import { ClientConfig, isValidTimeout, lowerCaseKeys, MAX_TIMEOUT_MS } from './ClientConfig';
import { TransportRequest } from './transports/Transport';

export type QueryValue = string | number | boolean | null | undefined;

/**
 * Arguments of one call.
 *
 * ```typescript
 * scope.get('/todos/{id}', { path: { id: 1 }, query: { expand: ['tags', 'owner'] } });
 * scope.post('/todos', { body: { title: 'write docs' } });
 * ```
 */
export interface CallArgs {
    /** Values for the `{placeholders}` of a templated call path. */
    path?: Readonly<Record<string, PathParamValue>>;
    /** Appended to the query string; arrays repeat the key, null and undefined are skipped. */
    query?: Readonly<Record<string, QueryValue | readonly QueryValue[]>>;
    /** Encoded with the route's codec. Nothing is sent when absent. */
    body?: unknown;
    headers?: Readonly<Record<string, string>>;
    /** Overrides the client timeout for this call, in milliseconds. */
    timeout?: number;
}

/**
 * HttpRequestSpec - Immutable description of one call, ready for a transport.
 */
export interface HttpRequestSpec extends TransportRequest {
    readonly timeoutMs: number;
    readonly route: Route;
    readonly pathParams: PathParams;
}

function isQueryList(value: QueryValue | readonly QueryValue[]): value is readonly QueryValue[] {
    return Array.isArray(value);
}

function splitCallPath(callPath: string): { pathname: string; search: string } {
    const withoutFragment = callPath.split('#')[0];
    const queryStart = withoutFragment.indexOf('?');
    if (queryStart === -1) {
        return { pathname: withoutFragment, search: '' };
    }
    return { pathname: withoutFragment.slice(0, queryStart), search: withoutFragment.slice(queryStart + 1) };
}

/**
 * RequestBuilder - Turns (method, call path, CallArgs) into an HttpRequestSpec.
 *
 * The call path is resolved against the router before anything else, so an
 * undeclared call fails with RouteNotFoundError without touching a transport.
 */
export class RequestBuilder {
    constructor(
        private readonly config: ClientConfig,
        private readonly router: ClientRouter,
    ) {}

    build(method: HttpMethod, callPath: string, args: CallArgs = {}): HttpRequestSpec {
        const { pathname, search } = splitCallPath(callPath);
        if (!pathname.startsWith('/')) {
            throw new RequestBuildError(`A call path must start with '/': "${callPath}"`);
        }

        const concretePath = this.substitute(pathname, args.path);
        const { route, params } = this.router.resolve(method, concretePath);

        const headers = { ...this.config.defaultHeaders, ...lowerCaseKeys(args.headers ?? {}) };
        let body: Uint8Array | undefined;
        if (args.body !== undefined) {
            body = this.encodeBody(route, method, concretePath, args.body);
            if (!('content-type' in headers)) {
                headers['content-type'] = route.codec.contentType;
            }
        }

        return Object.freeze({
            method,
            url: `${this.config.baseUrl}${concretePath}${this.buildQuery(search, args.query)}`,
            headers: Object.freeze(headers),
            body,
            timeoutMs: this.effectiveTimeout(args.timeout),
            route,
            pathParams: params,
        });
    }

    private substitute(pathname: string, pathArgs: CallArgs['path']): string {
        if (PathTemplate.hasPlaceholders(pathname)) {
            return this.parseCallTemplate(pathname).substitute(pathArgs ?? {});
        }
        const given = Object.keys(pathArgs ?? {});
        if (given.length > 0) {
            throw new RequestBuildError(
                `Path parameters ${given.join(', ')} given for "${pathname}", which has no placeholders`,
            );
        }
        return pathname;
    }

    /**
     * A malformed call path is a call-time mistake, so it raises RequestBuildError.
     */
    private parseCallTemplate(pathname: string): PathTemplate {
        try {
            return PathTemplate.parse(pathname);
        } catch (err: unknown) {
            const error = toError(err);
            if (error instanceof RouteTemplateError) {
                throw new RequestBuildError(`Invalid call path: ${error.message}`);
            }
            throw error;
        }
    }

    private buildQuery(search: string, query: CallArgs['query']): string {
        const params = new URLSearchParams(search);
        for (const [name, value] of Object.entries(query ?? {})) {
            const values = isQueryList(value) ? value : [value];
            for (const item of values) {
                if (item === null || item === undefined) {
                    continue;
                }
                params.append(name, String(item));
            }
        }
        const text = params.toString();
        return text === '' ? '' : `?${text}`;
    }

    private encodeBody(route: Route, method: HttpMethod, path: string, value: unknown): Uint8Array {
        try {
            return route.codec.encode(value);
        } catch (err: unknown) {
            const error = toError(err);
            throw new RequestBuildError(`Cannot encode the body of ${method} ${path}: ${error.message}`);
        }
    }

    private effectiveTimeout(timeout: number | undefined): number {
        if (timeout === undefined) {
            return this.config.timeout;
        }
        if (!isValidTimeout(timeout)) {
            throw new RequestBuildError(
                `timeout must be a whole number of milliseconds between 1 and ${MAX_TIMEOUT_MS}, got ${timeout}`,
            );
        }
        return timeout;
    }
}
