import 'reflect-metadata';

/**
 * Metadata keys used to record routes on attached types.
 */
export const METADATA_KEYS = {
    ROUTES: 'restbind:routes',
};

/**
 * AttachedType - A class whose instances represent the payload of a route.
 *
 * The constructor parameter list is left open; codec strategies check at
 * registration time whether the class can actually be built without arguments.
 */
export type AttachedType<T = unknown> = new (...args: never[]) => T;

/**
 * Route metadata stored on an attached type.
 * One entry per route the type was attached to.
 */
export class RouteMetadata {
    httpMethod: string;
    path: string;
    listOf: boolean;

    constructor(httpMethod: string, path: string, listOf: boolean) {
        this.httpMethod = httpMethod;
        this.path = path;
        this.listOf = listOf;
    }
}

/**
 * Records that a type was attached to a route.
 * Called by ClientRouter when its decorators run.
 */
export function recordRoute(type: AttachedType, metadata: RouteMetadata): void {
    const existing = getRoutes(type);
    Reflect.defineMetadata(METADATA_KEYS.ROUTES, [...existing, metadata], type);
}

/**
 * Lists every route a type has been attached to, in declaration order.
 *
 * ```typescript
 * @router.get('/{id}')
 * class Todo { ... }
 *
 * getRoutes(Todo); // [RouteMetadata { httpMethod: 'GET', path: '/todos/{id}', listOf: false }]
 * ```
 */
export function getRoutes(type: AttachedType): RouteMetadata[] {
    // getOwnMetadata: a subclass does not inherit its parent's routes
    const stored: unknown = Reflect.getOwnMetadata(METADATA_KEYS.ROUTES, type);
    if (!Array.isArray(stored)) {
        return [];
    }
    return stored.filter((entry): entry is RouteMetadata => entry instanceof RouteMetadata);
}

/**
 * Display name of an attached type for error messages.
 */
export function typeName(type: AttachedType): string {
    return type.name || 'anonymous class';
}
