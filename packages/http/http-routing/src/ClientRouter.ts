import {
    AttachedType,
    CodecRegistry,
    DeclarableMethod,
    defaultCodecRegistry,
    HttpMethod,
    PathTemplate,
    recordRoute,
    RouteCollisionError,
    RouteMetadata,
    RouteNotFoundError,
    RouteTemplateError,
    splitPath,
    typeName,
} from '@restbind/http-api';
import { ResolvedRoute, Route } from './Route';

export interface ClientRouterOptions {
    /** Prepended to every path registered on this router, e.g. '/todos'. */
    prefix?: string;
    /**
     * Resolves codecs at registration; defaults to the shared registry, which only
     * knows the built-in strategies. A type that needs an override (a class with
     * constructor arguments and no fromJson(), for instance) must be declared on a
     * router whose registry carries that override, or registration fails.
     */
    registry?: CodecRegistry;
}

export interface RouteOptions {
    /** The route returns a JSON array of the attached type. */
    listOf?: boolean;
}

/**
 * Class decorator returned by register() and its method-named shortcuts.
 * The decorated class is returned unchanged so it stacks with other decorators.
 */
export type RouteDecorator = <T extends AttachedType>(type: T) => T;

function validatePrefix(prefix: string): void {
    if (prefix === '') {
        return;
    }
    if (!prefix.startsWith('/')) {
        throw new RouteTemplateError(`A path prefix must start with '/': "${prefix}"`);
    }
    if (prefix.endsWith('/')) {
        throw new RouteTemplateError(
            `A path prefix must not end with '/', as the routes will start with '/': "${prefix}"`,
        );
    }
}

function stripQuery(path: string): string {
    const end = path.search(/[?#]/);
    return end === -1 ? path : path.slice(0, end);
}

/**
 * ClientRouter - Declares which type each (method, path) returns.
 *
 * ```typescript
 * const router = new ClientRouter({ prefix: '/todos' });
 *
 * @router.get('/{id:int}')
 * class Todo {
 *     id = 0;
 *     title = '';
 *     completed = false;
 * }
 *
 * client.includeRouter(router);
 * ```
 *
 * A router owns its routes and a tree of child routers, one per include prefix.
 * include() copies the sub-router, so later changes to it never reach this router,
 * and the same sub-router can be included under several prefixes.
 *
 * Every route is checked when it enters the router: a duplicate (method, template)
 * raises RouteCollisionError and a type without codec raises CodecUnavailableError.
 */
export class ClientRouter {
    readonly prefix: string;
    readonly registry: CodecRegistry;

    /** Routes declared directly on this router. */
    private readonly own = new Map<string, Route>();
    private readonly childRouters = new Map<string, ClientRouter>();
    /** Effective namespace: own routes plus every child's routes under its prefix, in insertion order. */
    private readonly namespace = new Map<string, Route>();

    constructor(options: ClientRouterOptions = {}) {
        this.prefix = options.prefix ?? '';
        validatePrefix(this.prefix);
        this.registry = options.registry ?? defaultCodecRegistry;
    }

    /**
     * Returns a decorator attaching a type to `method` + `path`.
     */
    register(method: DeclarableMethod, path: string, options: RouteOptions = {}): RouteDecorator {
        return <T extends AttachedType>(type: T): T => {
            this.addRoute(method, path, type, options);
            return type;
        };
    }

    /**
     * The GET method requests a representation of the specified resource.
     */
    get(path: string, options?: RouteOptions): RouteDecorator {
        return this.register('GET', path, options);
    }

    /**
     * The POST method submits an entity to the specified resource.
     */
    post(path: string, options?: RouteOptions): RouteDecorator {
        return this.register('POST', path, options);
    }

    /**
     * The PUT method replaces the target resource with the request payload.
     */
    put(path: string, options?: RouteOptions): RouteDecorator {
        return this.register('PUT', path, options);
    }

    /**
     * The PATCH method applies partial modifications to a resource.
     */
    patch(path: string, options?: RouteOptions): RouteDecorator {
        return this.register('PATCH', path, options);
    }

    /**
     * The DELETE method deletes the specified resource.
     */
    delete(path: string, options?: RouteOptions): RouteDecorator {
        return this.register('DELETE', path, options);
    }

    /**
     * The OPTIONS method describes the communication options for the target resource.
     */
    options(path: string, options?: RouteOptions): RouteDecorator {
        return this.register('OPTIONS', path, options);
    }

    /**
     * The TRACE method performs a message loop-back test along the path to the target resource.
     */
    trace(path: string, options?: RouteOptions): RouteDecorator {
        return this.register('TRACE', path, options);
    }

    /**
     * Programmatic form of register().
     */
    addRoute(method: DeclarableMethod, path: string, type: AttachedType, options: RouteOptions = {}): Route {
        const template = PathTemplate.parse(path).withPrefix(this.prefix);
        const listOf = options.listOf ?? false;

        const existing = this.namespace.get(`${method} ${template.key}`);
        if (existing) {
            throw this.collision(existing, method, template, typeName(type));
        }

        const route = new Route(method, template, type, this.resolveCodec(type, listOf), listOf);
        this.own.set(route.key, route);
        this.namespace.set(route.key, route);
        recordRoute(type, new RouteMetadata(method, template.source, listOf));
        return route;
    }

    /**
     * Copies every route and child of `router` into this router under `prefix`.
     * Codecs are resolved again through this router's registry. Nothing is added
     * when any incoming route collides.
     */
    include(router: ClientRouter, prefix = ''): void {
        validatePrefix(prefix);
        if (prefix === '') {
            const bare = router.routes().find((route) => route.template.isEmpty);
            if (bare) {
                throw new RouteTemplateError(`Prefix and path cannot be both empty (route: ${bare.toString()})`);
            }
        }

        const copy = router.copy(this.registry);
        for (const route of copy.routes()) {
            const prefixed = route.withPrefix(prefix);
            const existing = this.namespace.get(prefixed.key);
            if (existing) {
                throw this.collision(existing, prefixed.method, prefixed.template, typeName(prefixed.type));
            }
        }
        this.attach(prefix, copy);
    }

    /**
     * Finds the route answering `method` on a concrete path.
     *
     * Candidates are ranked left to right: a literal segment beats a parameter at the
     * first position where they differ. Equal candidates keep registration order.
     * HEAD calls are answered by GET routes.
     */
    resolve(method: HttpMethod, path: string): ResolvedRoute {
        const pathname = stripQuery(path);
        const segments = splitPath(pathname);

        let best: ResolvedRoute | undefined;
        for (const route of this.namespace.values()) {
            if (route.method !== method && !(method === 'HEAD' && route.method === 'GET')) {
                continue;
            }
            const params = route.template.match(segments);
            if (!params) {
                continue;
            }
            if (!best || route.template.compareSpecificity(best.route.template) < 0) {
                best = { route, params };
            }
        }

        if (!best) {
            throw new RouteNotFoundError(method, pathname);
        }
        return best;
    }

    /**
     * Every route of the effective namespace, in registration order.
     */
    routes(): Route[] {
        return Array.from(this.namespace.values());
    }

    /**
     * Child routers by include prefix. Returned routers are copies.
     */
    children(): ReadonlyMap<string, ClientRouter> {
        const result = new Map<string, ClientRouter>();
        for (const [prefix, child] of this.childRouters) {
            result.set(prefix, child.copy(child.registry));
        }
        return result;
    }

    private resolveCodec(type: AttachedType, listOf: boolean) {
        return listOf ? this.registry.resolveList(type) : this.registry.resolve(type);
    }

    private collision(existing: Route, method: string, template: PathTemplate, incoming: string): RouteCollisionError {
        return new RouteCollisionError(
            `${method} ${template.source || '/'} collides with ${existing.toString()}; cannot attach ${incoming}`,
            method,
            template.source,
        );
    }

    /**
     * Structural copy of this router, with codecs resolved by `registry`.
     */
    private copy(registry: CodecRegistry): ClientRouter {
        const clone = new ClientRouter({ registry });
        for (const route of this.own.values()) {
            const rebound = route.withCodec(clone.resolveCodec(route.type, route.listOf));
            clone.own.set(rebound.key, rebound);
            clone.namespace.set(rebound.key, rebound);
        }
        for (const [prefix, child] of this.childRouters) {
            clone.attach(prefix, child.copy(registry));
        }
        return clone;
    }

    /**
     * Adds a router this one now owns under `prefix`; callers have checked collisions.
     */
    private attach(prefix: string, child: ClientRouter): void {
        const existing = this.childRouters.get(prefix);
        if (existing) {
            existing.graft(child);
        } else {
            this.childRouters.set(prefix, child);
        }
        for (const route of child.routes()) {
            const prefixed = route.withPrefix(prefix);
            this.namespace.set(prefixed.key, prefixed);
        }
    }

    /**
     * Moves the routes and children of `source` into this router.
     */
    private graft(source: ClientRouter): void {
        for (const route of source.own.values()) {
            this.own.set(route.key, route);
            this.namespace.set(route.key, route);
        }
        for (const [prefix, child] of source.childRouters) {
            this.attach(prefix, child);
        }
    }
}
