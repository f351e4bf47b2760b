/**
 * Error classes for restbind.
 *
 * Two families live here:
 * - RestbindError and its subclasses: raised by the client itself (declaration,
 *   routing, scopes, transports, decoding).
 * - HttpError and its subclasses: built from non-2xx responses by
 *   RestResponse.raiseForStatus().
 */

/**
 * RestbindError - Base class for every error the client raises on its own.
 */
export class RestbindError extends Error {
    public readonly restbindCause?: Error;

    constructor(message: string, cause?: Error) {
        super(message);
        this.name = 'RestbindError';
        this.restbindCause = cause;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * RouteCollisionError - Two routes with the same method and normalised template.
 * Raised at declaration or inclusion time, never at request time.
 */
export class RouteCollisionError extends RestbindError {
    constructor(
        message: string,
        public readonly method: string,
        public readonly template: string,
    ) {
        super(message);
        this.name = 'RouteCollisionError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * RouteTemplateError - Malformed path template or include prefix.
 */
export class RouteTemplateError extends RestbindError {
    constructor(message: string) {
        super(message);
        this.name = 'RouteTemplateError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * CodecUnavailableError - No codec strategy supports the attached type.
 */
export class CodecUnavailableError extends RestbindError {
    constructor(message: string, public readonly typeName: string) {
        super(message);
        this.name = 'CodecUnavailableError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * RouteNotFoundError - No declared route matches the called method and path.
 */
export class RouteNotFoundError extends RestbindError {
    constructor(
        public readonly method: string,
        public readonly path: string,
    ) {
        super(`No route declared for ${method} ${path}`);
        this.name = 'RouteNotFoundError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * ScopeError - A call needed an active scope and there was none, or a second
 * scope was entered while one was open.
 */
export class ScopeError extends RestbindError {
    constructor(message: string) {
        super(message);
        this.name = 'ScopeError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * RequestBuildError - Path parameters did not fit the template being called.
 */
export class RequestBuildError extends RestbindError {
    constructor(message: string) {
        super(message);
        this.name = 'RequestBuildError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * ClientConfigError - Invalid client configuration.
 */
export class ClientConfigError extends RestbindError {
    constructor(message: string) {
        super(message);
        this.name = 'ClientConfigError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * TransportError - The request never produced a response.
 * Use the subclasses to tell the causes apart.
 */
export class TransportError extends RestbindError {
    constructor(message: string, cause?: Error) {
        super(message, cause);
        this.name = 'TransportError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * TransportConnectError - The connection could not be established.
 */
export class TransportConnectError extends TransportError {
    constructor(message: string, cause?: Error) {
        super(message, cause);
        this.name = 'TransportConnectError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * TransportReadError - The connection broke while reading the response.
 */
export class TransportReadError extends TransportError {
    constructor(message: string, cause?: Error) {
        super(message, cause);
        this.name = 'TransportReadError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * TransportTimeoutError - The effective timeout of the request expired.
 */
export class TransportTimeoutError extends TransportError {
    constructor(
        message: string,
        public readonly timeoutMs: number,
    ) {
        super(message);
        this.name = 'TransportTimeoutError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * TransportCancelledError - The scope exited while the request was in flight.
 */
export class TransportCancelledError extends TransportError {
    constructor(message: string) {
        super(message);
        this.name = 'TransportCancelledError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * DecodeError - The payload does not fit the attached type.
 * violations lists class-validator constraint messages when there are any.
 */
export class DecodeError extends RestbindError {
    constructor(
        message: string,
        public readonly violations: string[] = [],
        cause?: Error,
    ) {
        super(message, cause);
        this.name = 'DecodeError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * ProtocolError - Optional JSON error body sent by a server with a non-2xx status.
 */
export class ProtocolError {
    public message?: string;
    public subType?: string;
    public field?: string;
    public waitSeconds?: number;
    public guiAlertMessage?: string;
}

/**
 * HttpError - Base error class with HTTP status code.
 */
export class HttpError extends Error {
    public code: number;
    public subType?: string;

    constructor(message: string, code: number, subType?: string) {
        super(message);
        this.name = 'HttpError';
        this.code = code;
        this.subType = subType;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpBadRequestError - 400 Bad Request, with the offending field when known.
 */
export class HttpBadRequestError extends HttpError {
    public field?: string;
    public guiMessage?: string;

    constructor(message: string, field?: string, guiMessage?: string) {
        super(message, 400);
        this.name = 'BadRequest';
        this.field = field;
        this.guiMessage = guiMessage;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpUnauthorizedError - 401 Unauthorized.
 */
export class HttpUnauthorizedError extends HttpError {
    constructor(message: string, subType?: string) {
        super(message, 401, subType);
        this.name = 'Unauthorized';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpForbiddenError - 403 Forbidden.
 */
export class HttpForbiddenError extends HttpError {
    constructor(message: string) {
        super(message, 403);
        this.name = 'Forbidden';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpNotFoundError - 404 Not Found.
 */
export class HttpNotFoundError extends HttpError {
    constructor(message: string) {
        super(message, 404);
        this.name = 'NotFound';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpTimeoutError - 408 Request Timeout.
 */
export class HttpTimeoutError extends HttpError {
    constructor(message: string) {
        super(message, 408);
        this.name = 'Timeout';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpInternalServerError - 500 Internal Server Error.
 */
export class HttpInternalServerError extends HttpError {
    constructor(message: string) {
        super(message, 500);
        this.name = 'InternalServerError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpBadGatewayError - 502 Bad Gateway.
 */
export class HttpBadGatewayError extends HttpError {
    constructor(message: string) {
        super(message, 502);
        this.name = 'BadGateway';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpGatewayTimeoutError - 504 Gateway Timeout.
 */
export class HttpGatewayTimeoutError extends HttpError {
    constructor(message: string) {
        super(message, 504);
        this.name = 'GatewayTimeout';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpVendorError - 598, an upstream vendor failed; waitSeconds is the retry hint.
 */
export class HttpVendorError extends HttpError {
    constructor(
        message: string,
        public waitSeconds = 30,
    ) {
        super(message, 598);
        this.name = 'VendorError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}
