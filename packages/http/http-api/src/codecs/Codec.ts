import { toError } from '@restbind/core-util';
import { DecodeError } from '../errors';

/**
 * Codec - Encode/decode pair bound to one attached type.
 */
export interface Codec<T = unknown> {
    /** Name of the strategy that produced this codec, e.g. 'hooks'. */
    readonly strategy: string;
    readonly contentType: string;
    encode(value: unknown): Uint8Array;
    decode(body: Uint8Array): T;
}

export function bytesToText(body: Uint8Array): string {
    return Buffer.from(body.buffer, body.byteOffset, body.byteLength).toString('utf8');
}

export function textToBytes(text: string): Uint8Array {
    return Buffer.from(text, 'utf8');
}

/**
 * Parses a JSON body, turning syntax errors into DecodeError.
 */
export function parseJson(body: Uint8Array): unknown {
    const text = bytesToText(body);
    try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
    } catch (err: unknown) {
        const error = toError(err);
        throw new DecodeError(`Body is not valid JSON: ${error.message}`, [], error);
    }
}

/**
 * JsonCodec - Base for codecs that go through a JSON document.
 *
 * Subclasses only map between the parsed document and the attached type;
 * ListCodec reuses fromData/toData for each array element.
 */
export abstract class JsonCodec<T> implements Codec<T> {
    readonly contentType = 'application/json';

    abstract readonly strategy: string;

    /** Builds the attached type from a parsed JSON value. Throws DecodeError on mismatch. */
    abstract fromData(data: unknown): T;

    /** Turns a body value into something JSON.stringify can write. */
    toData(value: unknown): unknown {
        return value;
    }

    encode(value: unknown): Uint8Array {
        return textToBytes(JSON.stringify(this.toData(value)));
    }

    decode(body: Uint8Array): T {
        return this.fromData(parseJson(body));
    }
}

export function isJsonCodec(codec: Codec): codec is JsonCodec<unknown> {
    return codec instanceof JsonCodec;
}

export function isPlainRecord(data: unknown): data is Record<string, unknown> {
    return typeof data === 'object' && data !== null && !Array.isArray(data);
}
