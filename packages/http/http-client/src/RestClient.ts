import { CodecRegistry, HttpMethod, ScopeError } from '@restbind/http-api';
import { ClientRouter } from '@restbind/http-routing';
import { ClientConfig } from './ClientConfig';
import { LogApiCall } from './LogApiCall';
import { CallArgs, RequestBuilder } from './RequestBuilder';
import { BlockingRequest, NonBlockingRequest } from './requests';
import { BlockingScope, NonBlockingScope } from './scopes';

export type ActiveScope = BlockingScope | NonBlockingScope;
export type ClientRequest = BlockingRequest | NonBlockingRequest;

/**
 * RestClient - Issues requests against the routes it was given and decodes the
 * responses into their attached types.
 *
 * Usage:
 * ```typescript
 * const client = new RestClient(new ClientConfig('http://localhost:3000'));
 * client.includeRouter(todoRouter);
 *
 * const todo = client.withBlocking((scope) => scope.get('/todos/1').response().objectOf(Todo));
 *
 * const results = await client.withNonBlocking((scope) =>
 *     scope.gather([scope.get('/todos/1'), scope.get('/todos/2')]),
 * );
 * ```
 *
 * The client owns its root router and its own codec registry, built from the
 * config's codecOverrides. Included routers are copied and their codecs resolved
 * again through that registry. At most one scope is active at a time.
 */
export class RestClient {
    readonly router: ClientRouter;
    private readonly builder: RequestBuilder;
    private readonly logger: LogApiCall;
    private activeScope?: ActiveScope;

    constructor(
        readonly config: ClientConfig,
        router?: ClientRouter,
    ) {
        this.router = new ClientRouter({ registry: new CodecRegistry({ overrides: config.codecOverrides }) });
        if (router) {
            this.router.include(router);
        }
        this.builder = new RequestBuilder(config, this.router);
        this.logger = new LogApiCall(config.loggingEnabled, config.securedHeaders);
    }

    /**
     * Copies the routes of `router` under `prefix` into the client's root router.
     */
    includeRouter(router: ClientRouter, prefix = ''): this {
        this.router.include(router, prefix);
        return this;
    }

    /** The active scope, if any. */
    get scope(): ActiveScope | undefined {
        return this.activeScope;
    }

    /**
     * Binds a fresh blocking transport until the returned scope exits.
     */
    enterBlocking(): BlockingScope {
        this.ensureNoScope('blocking');
        const transport = this.config.blockingTransport();
        const scope: BlockingScope = new BlockingScope(transport, this.builder, this.logger, () => this.release(scope));
        this.activeScope = scope;
        return scope;
    }

    /**
     * Binds a fresh non-blocking transport until the returned scope exits.
     */
    enterNonBlocking(): NonBlockingScope {
        this.ensureNoScope('non-blocking');
        const transport = this.config.nonBlockingTransport();
        const scope: NonBlockingScope = new NonBlockingScope(transport, this.builder, this.logger, () =>
            this.release(scope),
        );
        this.activeScope = scope;
        return scope;
    }

    /**
     * Runs `body` inside a blocking scope that exits however `body` ends.
     */
    withBlocking<T>(body: (scope: BlockingScope) => T): T {
        const scope = this.enterBlocking();
        try {
            return body(scope);
        } finally {
            scope.exit();
        }
    }

    /**
     * Runs `body` inside a non-blocking scope that exits however `body` ends.
     */
    async withNonBlocking<T>(body: (scope: NonBlockingScope) => Promise<T>): Promise<T> {
        const scope = this.enterNonBlocking();
        try {
            return await body(scope);
        } finally {
            await scope.exit();
        }
    }

    /**
     * Builds a request through the active scope.
     */
    request(method: HttpMethod, path: string, args?: CallArgs): ClientRequest {
        const scope = this.activeScope;
        if (!scope) {
            throw new ScopeError(
                `No active scope for ${method} ${path}: call enterBlocking() or enterNonBlocking() first`,
            );
        }
        return scope.request(method, path, args);
    }

    get(path: string, args?: CallArgs): ClientRequest {
        return this.request('GET', path, args);
    }

    head(path: string, args?: CallArgs): ClientRequest {
        return this.request('HEAD', path, args);
    }

    post(path: string, args?: CallArgs): ClientRequest {
        return this.request('POST', path, args);
    }

    put(path: string, args?: CallArgs): ClientRequest {
        return this.request('PUT', path, args);
    }

    patch(path: string, args?: CallArgs): ClientRequest {
        return this.request('PATCH', path, args);
    }

    delete(path: string, args?: CallArgs): ClientRequest {
        return this.request('DELETE', path, args);
    }

    options(path: string, args?: CallArgs): ClientRequest {
        return this.request('OPTIONS', path, args);
    }

    trace(path: string, args?: CallArgs): ClientRequest {
        return this.request('TRACE', path, args);
    }

    private ensureNoScope(entering: string): void {
        if (this.activeScope) {
            throw new ScopeError(
                `Cannot enter a ${entering} scope: a ${this.activeScope.kind} scope is already active; exit it first`,
            );
        }
    }

    private release(scope: ActiveScope): void {
        if (this.activeScope === scope) {
            this.activeScope = undefined;
        }
    }
}
