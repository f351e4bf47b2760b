/**
 * @restbind/http-routing
 *
 * ClientRouter maps (method, path template) pairs to the type their response decodes into.
 * Routers nest through include(), the way a server groups routes under a prefix.
 */

export { Route, ResolvedRoute } from './Route';
export { ClientRouter, ClientRouterOptions, RouteOptions, RouteDecorator } from './ClientRouter';
