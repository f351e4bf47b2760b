import { toError } from '@restbind/core-util';
import { ClientConfigError, CodecRegistryOptions } from '@restbind/http-api';
import { FetchTransport } from './transports/FetchTransport';
import { SyncHttpTransport } from './transports/SyncHttpTransport';
import { BlockingTransportFactory, NonBlockingTransportFactory } from './transports/Transport';

export const DEFAULT_TIMEOUT_MS = 30_000;

/** Largest delay Node timers and child process timeouts accept (2^31 - 1 ms). */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * True for a whole number of milliseconds in 1..MAX_TIMEOUT_MS.
 */
export function isValidTimeout(timeout: number): boolean {
    return Number.isInteger(timeout) && timeout > 0 && timeout <= MAX_TIMEOUT_MS;
}

/** Header values masked in logs unless the config names others. */
export const DEFAULT_SECURED_HEADERS: readonly string[] = ['authorization', 'cookie', 'x-api-key'];

export interface ClientOptions {
    /** Sent with every request; call headers override them. */
    defaultHeaders?: Record<string, string>;
    /** Default per-request deadline in milliseconds. */
    timeout?: number;
    /**
     * Forces a codec strategy, or a ready codec, for given attached types.
     * Applied when routers are included into the client. Routers resolve codecs
     * as soon as a type is declared, so a type that only an override can serve
     * must be declared on a router built with `registry: new CodecRegistry({ overrides })`.
     */
    codecOverrides?: CodecRegistryOptions['overrides'];
    blockingTransport?: BlockingTransportFactory;
    nonBlockingTransport?: NonBlockingTransportFactory;
    loggingEnabled?: boolean;
    /** Header names whose values are masked in logs. */
    securedHeaders?: readonly string[];
}

const SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;
const FALSE_VALUES = ['false', '0', 'off', 'no'];

function normalizeBaseUrl(baseUrl: string | URL): string {
    const text = (typeof baseUrl === 'string' ? baseUrl : baseUrl.toString()).trim();
    if (text === '') {
        throw new ClientConfigError('baseUrl is required');
    }
    const withScheme = SCHEME.test(text) ? text : `http://${text}`;
    try {
        new URL(withScheme);
    } catch (err: unknown) {
        const error = toError(err);
        throw new ClientConfigError(`Invalid baseUrl "${text}": ${error.message}`);
    }
    return withScheme.replace(/\/+$/, '');
}

function validateTimeout(timeout: number): number {
    if (!isValidTimeout(timeout)) {
        throw new ClientConfigError(
            `timeout must be a whole number of milliseconds between 1 and ${MAX_TIMEOUT_MS}, got ${timeout}`,
        );
    }
    return timeout;
}

export function lowerCaseKeys(headers: Readonly<Record<string, string>>): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, value] of Object.entries(headers)) {
        result[name.toLowerCase()] = value;
    }
    return result;
}

/**
 * Configuration options for RestClient.
 *
 * Usage:
 * ```typescript
 * const config = new ClientConfig('localhost:3000', {
 *     defaultHeaders: { 'x-tenant': 'acme' },
 *     timeout: 5_000,
 * });
 * ```
 */
export class ClientConfig {
    /** Root of every request URL, without trailing slash (e.g. 'http://localhost:3000'). */
    readonly baseUrl: string;
    readonly defaultHeaders: Readonly<Record<string, string>>;
    readonly timeout: number;
    readonly codecOverrides: CodecRegistryOptions['overrides'];
    readonly blockingTransport: BlockingTransportFactory;
    readonly nonBlockingTransport: NonBlockingTransportFactory;
    readonly loggingEnabled: boolean;
    readonly securedHeaders: readonly string[];

    constructor(baseUrl: string | URL, options: ClientOptions = {}) {
        this.baseUrl = normalizeBaseUrl(baseUrl);
        this.defaultHeaders = Object.freeze(lowerCaseKeys(options.defaultHeaders ?? {}));
        this.timeout = validateTimeout(options.timeout ?? DEFAULT_TIMEOUT_MS);
        this.codecOverrides = options.codecOverrides;
        this.blockingTransport = options.blockingTransport ?? (() => new SyncHttpTransport());
        this.nonBlockingTransport = options.nonBlockingTransport ?? (() => new FetchTransport());
        this.loggingEnabled = options.loggingEnabled ?? true;
        this.securedHeaders = (options.securedHeaders ?? DEFAULT_SECURED_HEADERS).map((name) => name.toLowerCase());
    }

    /**
     * Builds a config from environment variables:
     * - RESTBIND_BASE_URL (required)
     * - RESTBIND_TIMEOUT_MS
     * - RESTBIND_LOGGING ('false', '0', 'off' or 'no' disable logging)
     *
     * Variables that are set win over `options`.
     */
    static fromEnv(env: NodeJS.ProcessEnv = process.env, options: ClientOptions = {}): ClientConfig {
        const baseUrl = env.RESTBIND_BASE_URL;
        if (!baseUrl) {
            throw new ClientConfigError('RESTBIND_BASE_URL is not set');
        }

        const merged: ClientOptions = { ...options };
        const timeout = env.RESTBIND_TIMEOUT_MS;
        if (timeout !== undefined && timeout !== '') {
            const parsed = Number(timeout);
            if (Number.isNaN(parsed)) {
                throw new ClientConfigError(`RESTBIND_TIMEOUT_MS is not a number: "${timeout}"`);
            }
            merged.timeout = parsed;
        }
        const logging = env.RESTBIND_LOGGING;
        if (logging !== undefined && logging !== '') {
            merged.loggingEnabled = !FALSE_VALUES.includes(logging.trim().toLowerCase());
        }
        return new ClientConfig(baseUrl, merged);
    }
}
