/**
 * @restbind/http-client
 *
 * Client side of restbind: a RestClient bound to one transport per scope.
 *
 * Usage:
 * ```typescript
 * const client = new RestClient(new ClientConfig('http://localhost:3000'));
 * client.includeRouter(todoRouter);
 *
 * const scope = client.enterBlocking();
 * try {
 *     const todo = scope.get('/todos/1').response().objectOf(Todo);
 * } finally {
 *     scope.exit();
 * }
 * ```
 */

export {
    ClientConfig,
    ClientOptions,
    DEFAULT_TIMEOUT_MS,
    DEFAULT_SECURED_HEADERS,
    MAX_TIMEOUT_MS,
    isValidTimeout,
} from './ClientConfig';
export { RestClient, ActiveScope, ClientRequest } from './RestClient';
export { ClientScope, BlockingScope, NonBlockingScope, ScopeKind, GatherResult } from './scopes';
export { BlockingRequest, NonBlockingRequest, InFlightExchange, RequestOwner, NonBlockingOwner } from './requests';
export { RequestBuilder, CallArgs, QueryValue, HttpRequestSpec } from './RequestBuilder';
export { RestResponse, ObjectOptions } from './RestResponse';
export { LogApiCall } from './LogApiCall';
export { ClientErrorTranslator, StatusLine } from './ClientErrorTranslator';

export {
    TransportRequest,
    RawResponse,
    BlockingTransport,
    NonBlockingTransport,
    BlockingTransportFactory,
    NonBlockingTransportFactory,
} from './transports/Transport';
export { FetchTransport, FetchLike, headersToRecord } from './transports/FetchTransport';
export { SyncHttpTransport, SyncRunner, SyncRunResult, spawnWorker } from './transports/SyncHttpTransport';
