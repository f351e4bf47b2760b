/**
 * @restbind/http-api
 *
 * Shared definitions for declaring REST routes and decoding their payloads.
 *
 * Architecture:
 * ```
 * http-api (methods, templates, codecs, errors)
 *    ↑
 *    ├── http-routing (ClientRouter: method + template → attached type)
 *    └── http-client (scopes, transports, requests, responses)
 * ```
 */

export { HTTP_METHODS, HttpMethod, DeclarableMethod, isHttpMethod } from './HttpMethod';

export {
    PathTemplate,
    TemplateSegment,
    ParamConverter,
    PathParamValue,
    PathParams,
    splitPath,
} from './PathTemplate';

export { AttachedType, RouteMetadata, METADATA_KEYS, recordRoute, getRoutes, typeName } from './decorators';

export { Codec, JsonCodec, isJsonCodec, parseJson, bytesToText, textToBytes, isPlainRecord } from './codecs/Codec';
export {
    CodecStrategy,
    JsonHooks,
    hasJsonHooks,
    isConstructibleWithoutArgs,
    formatValidationErrors,
    hooksStrategy,
    schemaModelStrategy,
    permissiveStrategy,
    DEFAULT_STRATEGIES,
} from './codecs/strategies';
export { ListCodec } from './codecs/ListCodec';
export { CodecRegistry, CodecRegistryOptions, CodecOverride, defaultCodecRegistry } from './codecs/CodecRegistry';

export {
    RestbindError,
    RouteCollisionError,
    RouteTemplateError,
    CodecUnavailableError,
    RouteNotFoundError,
    ScopeError,
    RequestBuildError,
    ClientConfigError,
    TransportError,
    TransportConnectError,
    TransportReadError,
    TransportTimeoutError,
    TransportCancelledError,
    DecodeError,
    ProtocolError,
    HttpError,
    HttpBadRequestError,
    HttpUnauthorizedError,
    HttpForbiddenError,
    HttpNotFoundError,
    HttpTimeoutError,
    HttpInternalServerError,
    HttpBadGatewayError,
    HttpGatewayTimeoutError,
    HttpVendorError,
} from './errors';
