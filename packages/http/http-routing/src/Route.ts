import { AttachedType, Codec, DeclarableMethod, PathParams, PathTemplate, typeName } from '@restbind/http-api';

/**
 * Route - One (method, template) pair bound to an attached type and its resolved codec.
 * Frozen once built; prefixing produces a new Route.
 */
export class Route {
    constructor(
        public readonly method: DeclarableMethod,
        public readonly template: PathTemplate,
        public readonly type: AttachedType,
        public readonly codec: Codec,
        public readonly listOf: boolean,
    ) {
        Object.freeze(this);
    }

    /**
     * Identity of the route inside a router: "GET /todos/{}".
     */
    get key(): string {
        return `${this.method} ${this.template.key}`;
    }

    withPrefix(prefix: string): Route {
        if (prefix === '') {
            return this;
        }
        return new Route(this.method, this.template.withPrefix(prefix), this.type, this.codec, this.listOf);
    }

    withCodec(codec: Codec): Route {
        return new Route(this.method, this.template, this.type, codec, this.listOf);
    }

    toString(): string {
        const payload = this.listOf ? `${typeName(this.type)}[]` : typeName(this.type);
        return `${this.method} ${this.template.source || '/'} -> ${payload}`;
    }
}

/**
 * ResolvedRoute - A route matched against a concrete path, with the parameters it extracted.
 */
export interface ResolvedRoute {
    readonly route: Route;
    readonly params: PathParams;
}
