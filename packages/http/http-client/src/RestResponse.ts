import { toError } from '@restbind/core-util';
import { AttachedType, bytesToText, DecodeError, parseJson, typeName } from '@restbind/http-api';
import { Route } from '@restbind/http-routing';
import { ClientErrorTranslator } from './ClientErrorTranslator';
import { RawResponse } from './transports/Transport';

type DecodeOutcome = { ok: true; value: unknown } | { ok: false; error: DecodeError };

export interface ObjectOptions {
    /** Return null instead of throwing when the body does not decode. */
    nullOnError?: boolean;
}

/**
 * RestResponse - A completed response and the lazily decoded attached type.
 *
 * The first object() call decodes the body through the route's codec and keeps
 * the outcome, value or DecodeError. Every later call returns that outcome without
 * decoding again, whichever scope the response came from and whether or not the
 * scope is still open.
 */
export class RestResponse {
    private outcome?: DecodeOutcome;

    constructor(
        private readonly raw: RawResponse,
        readonly route: Route,
    ) {}

    get status(): number {
        return this.raw.status;
    }

    get statusText(): string {
        return this.raw.statusText;
    }

    /** Response headers, names in lower case. */
    get headers(): Readonly<Record<string, string>> {
        return this.raw.headers;
    }

    get url(): string {
        return this.raw.url;
    }

    /** Raw body bytes. */
    get body(): Uint8Array {
        return this.raw.body;
    }

    get ok(): boolean {
        return this.raw.status >= 200 && this.raw.status < 300;
    }

    text(): string {
        return bytesToText(this.raw.body);
    }

    /**
     * Parsed JSON body, without going through the route's codec.
     */
    json(): unknown {
        return parseJson(this.raw.body);
    }

    /**
     * The body decoded into the route's attached type (an array of it for list routes).
     */
    object(options: ObjectOptions = {}): unknown {
        const outcome = this.outcome ?? this.decode();
        if (outcome.ok) {
            return outcome.value;
        }
        if (options.nullOnError) {
            return null;
        }
        throw outcome.error;
    }

    /**
     * object(), checked against the type the caller expects.
     *
     * ```typescript
     * const todo = response.objectOf(Todo); // Todo
     * ```
     */
    objectOf<T>(type: AttachedType<T>): T {
        this.expectRoute(type, false);
        const value = this.object();
        if (!(value instanceof type)) {
            throw new DecodeError(`Error trying to retrieve ${this.url}: [decoded value is not a ${typeName(type)}]`);
        }
        return value;
    }

    /**
     * object() of a list route, checked element by element.
     */
    listOf<T>(type: AttachedType<T>): T[] {
        this.expectRoute(type, true);
        const value = this.object();
        if (!Array.isArray(value)) {
            throw new DecodeError(`Error trying to retrieve ${this.url}: [decoded value is not a list]`);
        }
        const elements: unknown[] = value;
        const items: T[] = [];
        for (const [index, item] of elements.entries()) {
            if (!(item instanceof type)) {
                throw new DecodeError(
                    `Error trying to retrieve ${this.url}: [element ${index} is not a ${typeName(type)}]`,
                );
            }
            items.push(item);
        }
        return items;
    }

    /**
     * Throws the HttpError matching a non-2xx status.
     * Returns this response otherwise, so calls chain.
     */
    raiseForStatus(): this {
        if (this.ok) {
            return this;
        }
        const protocolError = ClientErrorTranslator.readProtocolError(this.text());
        throw ClientErrorTranslator.translateError(this.raw, protocolError);
    }

    private expectRoute(type: AttachedType, listOf: boolean): void {
        if (this.route.type !== type || this.route.listOf !== listOf) {
            const expected = listOf ? `${typeName(type)}[]` : typeName(type);
            throw new DecodeError(`Route ${this.route.toString()} does not return ${expected}`);
        }
    }

    private decode(): DecodeOutcome {
        let outcome: DecodeOutcome;
        try {
            outcome = { ok: true, value: this.route.codec.decode(this.raw.body) };
        } catch (err: unknown) {
            const error = toError(err);
            const violations = error instanceof DecodeError ? error.violations : [];
            outcome = {
                ok: false,
                error: new DecodeError(`Error trying to retrieve ${this.url}: [${error.message}]`, violations, error),
            };
        }
        this.outcome = outcome;
        return outcome;
    }
}
