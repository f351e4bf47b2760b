import { toError } from '@restbind/core-util';
import { DecodeError } from '../errors';
import { JsonCodec } from './Codec';

/**
 * ListCodec - Decodes a JSON array whose elements are the attached type.
 * Used for routes declared with `{ listOf: true }`.
 */
export class ListCodec<T> extends JsonCodec<T[]> {
    readonly strategy: string;

    constructor(private readonly element: JsonCodec<T>) {
        super();
        this.strategy = `list:${element.strategy}`;
    }

    fromData(data: unknown): T[] {
        if (!Array.isArray(data)) {
            throw new DecodeError('Expected a JSON array');
        }
        return data.map((item: unknown, index: number) => {
            try {
                return this.element.fromData(item);
            } catch (err: unknown) {
                const error = toError(err);
                if (error instanceof DecodeError) {
                    throw new DecodeError(`Element ${index}: ${error.message}`, error.violations, error);
                }
                throw error;
            }
        });
    }

    toData(value: unknown): unknown {
        if (!Array.isArray(value)) {
            return this.element.toData(value);
        }
        return value.map((item: unknown) => this.element.toData(item));
    }
}
