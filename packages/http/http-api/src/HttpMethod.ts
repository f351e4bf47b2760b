/**
 * HTTP methods a client call may use.
 */
export const HTTP_METHODS = ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS', 'TRACE'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

/**
 * Methods a type can be attached to. HEAD is answered by GET routes and has no body to decode.
 */
export type DeclarableMethod = Exclude<HttpMethod, 'HEAD'>;

export function isHttpMethod(value: string): value is HttpMethod {
    return HTTP_METHODS.some((method) => method === value);
}
