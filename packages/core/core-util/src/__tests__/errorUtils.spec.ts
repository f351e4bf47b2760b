import { describeError, toError } from '../lib/errorUtils';

describe('toError', () => {
    describe('Error instances', () => {
        it('should return Error instances unchanged', () => {
            const original = new Error('connect refused');

            expect(toError(original)).toBe(original);
        });

        it('should return subclasses unchanged', () => {
            class TimeoutLike extends Error {
                constructor(message: string) {
                    super(message);
                    this.name = 'TimeoutLike';
                }
            }
            const original = new TimeoutLike('too slow');
            const result = toError(original);

            expect(result).toBe(original);
            expect(result.name).toBe('TimeoutLike');
        });
    });

    describe('Error-like objects', () => {
        it('should keep message, name and stack', () => {
            const result = toError({
                message: 'fetch failed',
                name: 'TypeError',
                stack: 'TypeError: fetch failed\n    at somewhere',
            });

            expect(result).toBeInstanceOf(Error);
            expect(result.message).toBe('fetch failed');
            expect(result.name).toBe('TypeError');
            expect(result.stack).toBe('TypeError: fetch failed\n    at somewhere');
        });

        it('should stringify objects without a message', () => {
            const result = toError({ status: 502 });

            expect(result.message).toBe('Non-Error object thrown: {"status":502}');
        });

        it('should survive circular objects', () => {
            const loop: { self?: unknown } = {};
            loop.self = loop;

            expect(toError(loop).message).toBe('Non-Error object thrown (unable to stringify)');
        });
    });

    describe('Primitive values', () => {
        it('should use strings as the message', () => {
            expect(toError('socket hang up').message).toBe('socket hang up');
        });

        it('should stringify numbers', () => {
            expect(toError(408).message).toBe('408');
        });

        it('should handle null and undefined', () => {
            expect(toError(null).message).toBe('Null or undefined thrown');
            expect(toError(undefined).message).toBe('Null or undefined thrown');
        });
    });
});

describe('describeError', () => {
    it('should prefix the message with the class name', () => {
        class DecodeProblem extends Error {}

        expect(describeError(new DecodeProblem('bad json'))).toBe('DecodeProblem: bad json');
        expect(describeError('plain')).toBe('Error: plain');
    });
});
