import { toError } from '@restbind/core-util';
import { HttpMethod, ScopeError, TransportCancelledError } from '@restbind/http-api';
import { LogApiCall } from './LogApiCall';
import { CallArgs, HttpRequestSpec, RequestBuilder } from './RequestBuilder';
import { RestResponse } from './RestResponse';
import { BlockingRequest, InFlightExchange, NonBlockingOwner, NonBlockingRequest, RequestOwner } from './requests';
import { BlockingTransport, NonBlockingTransport } from './transports/Transport';

export type ScopeKind = 'blocking' | 'non-blocking';

/**
 * One slot of scope.gather(): the response, or the error of that request alone.
 */
export type GatherResult = { ok: true; response: RestResponse } | { ok: false; error: Error };

/**
 * ClientScope - The period during which a client is bound to one transport.
 *
 * Issues requests through the method-named calls. Once exit() has run, every
 * call raises ScopeError; responses already received stay readable.
 */
export abstract class ClientScope<R> implements RequestOwner {
    abstract readonly kind: ScopeKind;
    private exited = false;

    constructor(
        protected readonly builder: RequestBuilder,
        protected readonly logger: LogApiCall,
        private readonly onExit: () => void,
    ) {}

    get active(): boolean {
        return !this.exited;
    }

    ensureActive(action: string): void {
        if (this.exited) {
            throw new ScopeError(`The ${this.kind} scope has exited; cannot ${action}`);
        }
    }

    /**
     * Builds a request for `method` on `path`. Nothing is sent until response() is called.
     */
    request(method: HttpMethod, path: string, args?: CallArgs): R {
        this.ensureActive(`call ${method} ${path}`);
        return this.createRequest(this.builder.build(method, path, args));
    }

    get(path: string, args?: CallArgs): R {
        return this.request('GET', path, args);
    }

    /**
     * HEAD is answered by the GET route of the path.
     */
    head(path: string, args?: CallArgs): R {
        return this.request('HEAD', path, args);
    }

    post(path: string, args?: CallArgs): R {
        return this.request('POST', path, args);
    }

    put(path: string, args?: CallArgs): R {
        return this.request('PUT', path, args);
    }

    patch(path: string, args?: CallArgs): R {
        return this.request('PATCH', path, args);
    }

    delete(path: string, args?: CallArgs): R {
        return this.request('DELETE', path, args);
    }

    options(path: string, args?: CallArgs): R {
        return this.request('OPTIONS', path, args);
    }

    trace(path: string, args?: CallArgs): R {
        return this.request('TRACE', path, args);
    }

    protected abstract createRequest(prepared: HttpRequestSpec): R;

    /**
     * Marks the scope exited. False when it already was.
     */
    protected beginExit(): boolean {
        if (this.exited) {
            return false;
        }
        this.exited = true;
        return true;
    }

    /**
     * Hands the client's scope slot back.
     */
    protected finishExit(): void {
        this.onExit();
    }
}

/**
 * BlockingScope - Requests run one after the other on the caller's stack.
 */
export class BlockingScope extends ClientScope<BlockingRequest> {
    readonly kind = 'blocking';

    constructor(
        private readonly transport: BlockingTransport,
        builder: RequestBuilder,
        logger: LogApiCall,
        onExit: () => void,
    ) {
        super(builder, logger, onExit);
    }

    /**
     * Closes the transport. Calling it again does nothing.
     */
    exit(): void {
        if (!this.beginExit()) {
            return;
        }
        try {
            this.transport.close();
        } finally {
            this.finishExit();
        }
    }

    protected createRequest(prepared: HttpRequestSpec): BlockingRequest {
        return new BlockingRequest(prepared, this, this.transport, this.logger);
    }
}

/**
 * NonBlockingScope - Requests run concurrently; each response() is a suspension point.
 */
export class NonBlockingScope extends ClientScope<NonBlockingRequest> implements NonBlockingOwner {
    readonly kind = 'non-blocking';
    private readonly inFlight = new Set<InFlightExchange>();

    constructor(
        private readonly transport: NonBlockingTransport,
        builder: RequestBuilder,
        logger: LogApiCall,
        onExit: () => void,
    ) {
        super(builder, logger, onExit);
    }

    track(exchange: InFlightExchange): () => void {
        this.inFlight.add(exchange);
        return () => {
            this.inFlight.delete(exchange);
        };
    }

    /**
     * Number of exchanges waiting for their response.
     */
    get outstanding(): number {
        return this.inFlight.size;
    }

    /**
     * Awaits every request and returns one slot per request, in the order given.
     * A failure fills its own slot and never rejects the whole batch.
     *
     * ```typescript
     * const [first, second] = await scope.gather([scope.get('/todos/1'), scope.get('/todos/2')]);
     * if (first.ok) {
     *     console.log(first.response.object());
     * }
     * ```
     */
    async gather(requests: readonly NonBlockingRequest[]): Promise<GatherResult[]> {
        const settled = await Promise.allSettled(requests.map((request) => request.response()));
        return settled.map((result): GatherResult => {
            if (result.status === 'fulfilled') {
                return { ok: true, response: result.value };
            }
            return { ok: false, error: toError(result.reason) };
        });
    }

    /**
     * Cancels every outstanding exchange with TransportCancelledError, then closes
     * the transport. Calling it again does nothing.
     */
    async exit(): Promise<void> {
        if (!this.beginExit()) {
            return;
        }
        for (const exchange of this.inFlight) {
            exchange.cancel(new TransportCancelledError(`${exchange.description} was cancelled: the scope exited`));
        }
        this.inFlight.clear();
        try {
            await this.transport.close();
        } finally {
            this.finishExit();
        }
    }

    protected createRequest(prepared: HttpRequestSpec): NonBlockingRequest {
        return new NonBlockingRequest(prepared, this, this.transport, this.logger);
    }
}
