import { IsInt, IsString } from 'class-validator';
import { bytesToText, Codec, textToBytes } from '../codecs/Codec';
import { CodecRegistry } from '../codecs/CodecRegistry';
import { permissiveStrategy, schemaModelStrategy } from '../codecs/strategies';
import { CodecUnavailableError, DecodeError } from '../errors';

class Money {
    constructor(public readonly cents: number) {}

    static fromJson(data: unknown): Money {
        if (typeof data !== 'object' || data === null || !('cents' in data) || typeof data.cents !== 'number') {
            throw new Error('cents missing');
        }
        return new Money(data.cents);
    }

    toJson(): unknown {
        return { cents: this.cents, currency: 'EUR' };
    }
}

class TodoModel {
    @IsInt()
    id!: number;

    @IsString()
    title!: string;
}

class Todo {
    id = 0;
    title = '';
    completed = false;
}

class NeedsArgs {
    constructor(public readonly value: string) {}
}

const bytes = (text: string): Uint8Array => textToBytes(text);

describe('CodecRegistry', () => {
    let registry: CodecRegistry;

    beforeEach(() => {
        registry = new CodecRegistry();
    });

    describe('strategy probing', () => {
        it('should prefer explicit hooks', () => {
            const codec = registry.resolve(Money);

            expect(codec.strategy).toBe('hooks');
            const money = codec.decode(bytes('{"cents":250}'));
            expect(money).toBeInstanceOf(Money);
            expect(money).toEqual(new Money(250));
            expect(bytesToText(codec.encode(new Money(5)))).toBe('{"cents":5,"currency":"EUR"}');
        });

        it('should wrap hook failures in DecodeError', () => {
            expect(() => registry.resolve(Money).decode(bytes('{}'))).toThrow(
                new DecodeError('Cannot build Money: cents missing'),
            );
        });

        it('should use class-validator models as schemas', () => {
            const codec = registry.resolve(TodoModel);

            expect(codec.strategy).toBe('schema');
            const todo = codec.decode(bytes('{"id":3,"title":"write tests"}'));
            expect(todo).toBeInstanceOf(TodoModel);
            expect(todo).toEqual({ id: 3, title: 'write tests' });
        });

        it('should report validation violations', () => {
            const codec = registry.resolve(TodoModel);

            try {
                codec.decode(bytes('{"id":"three","title":"x"}'));
                throw new Error('decode should have failed');
            } catch (err: unknown) {
                expect(err).toBeInstanceOf(DecodeError);
                if (err instanceof DecodeError) {
                    expect(err.violations).toEqual(['id must be an integer number']);
                    expect(err.message).toBe('TodoModel failed validation: id must be an integer number');
                }
            }
        });

        it('should fall back to the permissive strategy', () => {
            const codec = registry.resolve(Todo);

            expect(codec.strategy).toBe('permissive');
            const todo = codec.decode(bytes('{"id":1,"title":"x","completed":false}'));
            expect(todo).toBeInstanceOf(Todo);
            expect(todo).toEqual({ id: 1, title: 'x', completed: false });
        });

        it('should refuse non-object payloads for permissive types', () => {
            expect(() => registry.resolve(Todo).decode(bytes('[1,2]'))).toThrow('Expected a JSON object for Todo');
        });

        it('should raise DecodeError for malformed JSON', () => {
            expect(() => registry.resolve(Todo).decode(bytes('{"id":'))).toThrow(DecodeError);
        });

        it('should raise CodecUnavailableError for types nothing supports', () => {
            expect(() => registry.resolve(NeedsArgs)).toThrow(CodecUnavailableError);
            expect(registry.has(NeedsArgs)).toBe(false);
        });
    });

    describe('caching', () => {
        it('should resolve each type once', () => {
            const first = registry.resolve(Todo);

            expect(registry.has(Todo)).toBe(true);
            expect(registry.resolve(Todo)).toBe(first);
        });
    });

    describe('overrides', () => {
        it('should use a ready-made codec for its type', () => {
            const custom: Codec<string> = {
                strategy: 'upper',
                contentType: 'text/plain',
                encode: (value: unknown) => textToBytes(String(value)),
                decode: (body: Uint8Array) => bytesToText(body).toUpperCase(),
            };
            const overridden = new CodecRegistry({ overrides: [[Todo, custom]] });

            expect(overridden.resolve(Todo)).toBe(custom);
            expect(overridden.resolve(Todo).decode(bytes('abc'))).toBe('ABC');
        });

        it('should force a strategy', () => {
            const overridden = new CodecRegistry({ overrides: [[TodoModel, permissiveStrategy]] });

            expect(overridden.resolve(TodoModel).strategy).toBe('permissive');
        });

        it('should fail at construction when the forced strategy cannot handle the type', () => {
            expect(() => new CodecRegistry({ overrides: [[Todo, schemaModelStrategy]] })).toThrow(
                "Override strategy 'schema' does not support Todo",
            );
        });

        it('should refuse list routes over custom codecs', () => {
            const custom: Codec = {
                strategy: 'raw',
                contentType: 'application/octet-stream',
                encode: (value: unknown) => textToBytes(String(value)),
                decode: (body: Uint8Array) => body,
            };
            const overridden = new CodecRegistry({ overrides: [[Todo, custom]] });

            expect(() => overridden.resolveList(Todo)).toThrow(CodecUnavailableError);
        });
    });

    describe('resolveList', () => {
        it('should decode every element', () => {
            const codec = registry.resolveList(Todo);

            expect(codec.strategy).toBe('list:permissive');
            expect(codec.decode(bytes('[{"id":1},{"id":2}]'))).toEqual([
                { id: 1, title: '', completed: false },
                { id: 2, title: '', completed: false },
            ]);
        });

        it('should name the failing element', () => {
            expect(() => registry.resolveList(Todo).decode(bytes('[{"id":1},3]'))).toThrow(
                'Element 1: Expected a JSON object for Todo',
            );
        });
    });
});
