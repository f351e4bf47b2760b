import { describeError, toError } from '@restbind/core-util';
import { ScopeError, TransportError, TransportTimeoutError } from '@restbind/http-api';
import { LogApiCall } from './LogApiCall';
import { HttpRequestSpec } from './RequestBuilder';
import { RestResponse } from './RestResponse';
import { BlockingTransport, NonBlockingTransport, RawResponse } from './transports/Transport';

/**
 * What a request needs from the scope that issued it.
 */
export interface RequestOwner {
    readonly active: boolean;
    /** Throws ScopeError once the scope has exited. */
    ensureActive(action: string): void;
}

export interface NonBlockingOwner extends RequestOwner {
    /** Registers an in-flight exchange; the returned function unregisters it. */
    track(exchange: InFlightExchange): () => void;
}

function describeRequest(prepared: HttpRequestSpec): string {
    return `${prepared.method} ${prepared.url}`;
}

function asTransportError(error: Error, prepared: HttpRequestSpec): Error {
    if (error instanceof TransportError || error instanceof ScopeError) {
        return error;
    }
    return new TransportError(`${describeRequest(prepared)} failed: ${describeError(error)}`, error);
}

/**
 * InFlightExchange - Cancellation handle of one non-blocking exchange.
 *
 * cancel() records the first reason, rejects `aborted` with it and aborts the
 * signal handed to the transport.
 */
export class InFlightExchange {
    readonly controller = new AbortController();
    readonly aborted: Promise<never>;
    private cancelReason?: TransportError;
    private rejectAborted?: (reason: TransportError) => void;

    constructor(readonly description: string) {
        this.aborted = new Promise<never>((_resolve, reject) => {
            this.rejectAborted = reject;
        });
    }

    get reason(): TransportError | undefined {
        return this.cancelReason;
    }

    cancel(reason: TransportError): void {
        if (this.cancelReason) {
            return;
        }
        this.cancelReason = reason;
        this.rejectAborted?.(reason);
        this.controller.abort(reason);
    }
}

/**
 * BlockingRequest - One call issued in a blocking scope.
 *
 * response() sends on the caller's stack the first time and returns the same
 * RestResponse afterwards, also after the scope exited. A failed send is not
 * kept: calling response() again sends again while the scope is active.
 */
export class BlockingRequest {
    private cached?: RestResponse;

    constructor(
        readonly prepared: HttpRequestSpec,
        private readonly owner: RequestOwner,
        private readonly transport: BlockingTransport,
        private readonly logger: LogApiCall,
    ) {}

    response(): RestResponse {
        if (this.cached) {
            return this.cached;
        }
        this.owner.ensureActive(`send ${describeRequest(this.prepared)}`);

        const raw = this.logger.executeSync(this.prepared, () => this.send());
        this.cached = new RestResponse(raw, this.prepared.route);
        return this.cached;
    }

    private send(): RawResponse {
        try {
            return this.transport.send(this.prepared, this.prepared.timeoutMs);
        } catch (err: unknown) {
            const error = toError(err);
            throw asTransportError(error, this.prepared);
        }
    }
}

/**
 * NonBlockingRequest - One call issued in a non-blocking scope.
 *
 * response() starts the exchange on first use; concurrent callers share the
 * same promise. The exchange ends with TransportTimeoutError when the effective
 * timeout expires and with TransportCancelledError when the scope exits, even if
 * the transport ignores its abort signal.
 */
export class NonBlockingRequest {
    private pending?: Promise<RestResponse>;

    constructor(
        readonly prepared: HttpRequestSpec,
        private readonly owner: NonBlockingOwner,
        private readonly transport: NonBlockingTransport,
        private readonly logger: LogApiCall,
    ) {}

    response(): Promise<RestResponse> {
        if (!this.pending) {
            this.pending = this.perform();
        }
        return this.pending;
    }

    private async perform(): Promise<RestResponse> {
        try {
            const raw = await this.logger.execute(this.prepared, () => this.exchange());
            return new RestResponse(raw, this.prepared.route);
        } catch (err: unknown) {
            const error = toError(err);
            // failures are not kept; a later response() tries again
            this.pending = undefined;
            throw error;
        }
    }

    private async exchange(): Promise<RawResponse> {
        this.owner.ensureActive(`send ${describeRequest(this.prepared)}`);

        const { timeoutMs } = this.prepared;
        const inFlight = new InFlightExchange(describeRequest(this.prepared));
        const untrack = this.owner.track(inFlight);
        const timer = setTimeout(() => {
            inFlight.cancel(
                new TransportTimeoutError(`${describeRequest(this.prepared)} timed out after ${timeoutMs}ms`, timeoutMs),
            );
        }, timeoutMs);

        try {
            return await Promise.race([this.transport.send(this.prepared, inFlight.controller.signal), inFlight.aborted]);
        } catch (err: unknown) {
            const error = toError(err);
            throw inFlight.reason ?? asTransportError(error, this.prepared);
        } finally {
            clearTimeout(timer);
            untrack();
        }
    }
}
