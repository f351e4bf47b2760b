import { RequestBuildError, RouteTemplateError } from './errors';

/**
 * Converter of a parameter segment: `{id}` is `str`, `{id:int}` is `int`.
 */
export type ParamConverter = 'str' | 'int';

export type TemplateSegment =
    | { readonly kind: 'literal'; readonly value: string }
    | { readonly kind: 'param'; readonly name: string; readonly converter: ParamConverter };

export type PathParamValue = string | number | boolean;

export type PathParams = Readonly<Record<string, string | number>>;

const PARAM_PATTERN = /^\{([A-Za-z_][A-Za-z0-9_]*)(?::(str|int))?\}$/;
const PLACEHOLDER_PATTERN = /\{[^/]*\}/;
const DIGITS = /^\d+$/;

/**
 * Splits a concrete path or a template into its non-empty segments.
 * A trailing slash and doubled slashes carry no segment.
 */
export function splitPath(path: string): string[] {
    return path.split('/').filter((segment) => segment !== '');
}

function decodeSegment(raw: string): string | undefined {
    try {
        return decodeURIComponent(raw);
    } catch (err: unknown) {
        //const error = toError(err);
        // malformed escapes never match a route
        return undefined;
    }
}

function parseSegment(raw: string, template: string): TemplateSegment {
    const param = PARAM_PATTERN.exec(raw);
    if (param) {
        const converter: ParamConverter = param[2] === 'int' ? 'int' : 'str';
        return { kind: 'param', name: param[1], converter };
    }
    if (raw.includes('{') || raw.includes('}')) {
        throw new RouteTemplateError(
            `Invalid segment "${raw}" in template "${template}": a parameter must fill the whole segment, as in {name} or {name:int}`,
        );
    }
    return { kind: 'literal', value: raw };
}

/**
 * PathTemplate - Parsed form of a route path such as `/todos/{id:int}`.
 *
 * Templates are compared through their key, which replaces every parameter with `{}`.
 * `/users/{id}` and `/users/{userId}` therefore share one key.
 */
export class PathTemplate {
    private constructor(
        public readonly source: string,
        public readonly segments: readonly TemplateSegment[],
    ) {}

    static parse(template: string): PathTemplate {
        if (template !== '' && !template.startsWith('/')) {
            throw new RouteTemplateError(`A path template must start with '/': "${template}"`);
        }
        const segments = splitPath(template).map((raw) => parseSegment(raw, template));

        const seen = new Set<string>();
        for (const segment of segments) {
            if (segment.kind !== 'param') {
                continue;
            }
            if (seen.has(segment.name)) {
                throw new RouteTemplateError(`Parameter "${segment.name}" appears twice in "${template}"`);
            }
            seen.add(segment.name);
        }
        return new PathTemplate(template, segments);
    }

    /**
     * True when a call path still contains `{placeholders}` to substitute.
     */
    static hasPlaceholders(path: string): boolean {
        return PLACEHOLDER_PATTERN.test(path);
    }

    get key(): string {
        const parts = this.segments.map((segment) => (segment.kind === 'literal' ? segment.value : '{}'));
        return `/${parts.join('/')}`;
    }

    get paramNames(): string[] {
        const names: string[] = [];
        for (const segment of this.segments) {
            if (segment.kind === 'param') {
                names.push(segment.name);
            }
        }
        return names;
    }

    /** True for the empty template, which only makes sense below a prefix. */
    get isEmpty(): boolean {
        return this.source === '';
    }

    withPrefix(prefix: string): PathTemplate {
        return PathTemplate.parse(`${prefix}${this.source}`);
    }

    /**
     * Matches already split path segments.
     * Returns the extracted parameters, or undefined when the path does not fit.
     */
    match(pathSegments: readonly string[]): PathParams | undefined {
        if (pathSegments.length !== this.segments.length) {
            return undefined;
        }
        const params: Record<string, string | number> = {};
        for (let i = 0; i < this.segments.length; i++) {
            const segment = this.segments[i];
            const value = decodeSegment(pathSegments[i]);
            if (value === undefined) {
                return undefined;
            }
            if (segment.kind === 'literal') {
                if (segment.value !== value) {
                    return undefined;
                }
                continue;
            }
            if (segment.converter === 'int') {
                if (!DIGITS.test(value)) {
                    return undefined;
                }
                params[segment.name] = Number(value);
            } else {
                params[segment.name] = value;
            }
        }
        return params;
    }

    /**
     * Builds a concrete path from this template.
     * Every parameter must be supplied and nothing else may be.
     */
    substitute(params: Readonly<Record<string, PathParamValue>>): string {
        const names = this.paramNames;
        for (const supplied of Object.keys(params)) {
            if (!names.includes(supplied)) {
                throw new RequestBuildError(`Unexpected path parameter "${supplied}" for "${this.source}"`);
            }
        }

        const parts = this.segments.map((segment) => {
            if (segment.kind === 'literal') {
                return segment.value;
            }
            if (!(segment.name in params)) {
                throw new RequestBuildError(`Missing path parameter "${segment.name}" for "${this.source}"`);
            }
            const text = String(params[segment.name]);
            if (segment.converter === 'int' && !DIGITS.test(text)) {
                throw new RequestBuildError(
                    `Path parameter "${segment.name}" of "${this.source}" must be a non-negative integer, got "${text}"`,
                );
            }
            return encodeURIComponent(text);
        });
        return `/${parts.join('/')}`;
    }

    /**
     * Orders two templates of equal length by specificity, left to right.
     * Negative when this template is more specific: a literal beats a parameter at the
     * first position where they differ in kind.
     */
    compareSpecificity(other: PathTemplate): number {
        const length = Math.min(this.segments.length, other.segments.length);
        for (let i = 0; i < length; i++) {
            const mine = this.segments[i].kind;
            const theirs = other.segments[i].kind;
            if (mine === theirs) {
                continue;
            }
            return mine === 'literal' ? -1 : 1;
        }
        return 0;
    }

    toString(): string {
        return this.source;
    }
}
