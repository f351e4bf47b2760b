/**
 * Normalisation of caught values.
 *
 * Every catch block in restbind goes through toError() so that wrapping errors
 * (TransportError, DecodeError, ...) always receive a real Error as their cause:
 * ```typescript
 * try {
 *     transport.send(request);
 * } catch (err: unknown) {
 *     const error = toError(err);
 *     throw new TransportConnectError(error.message, error);
 * }
 * ```
 */

/**
 * Converts whatever was thrown into an Error instance.
 *
 * - Error instances (and subclasses) come back unchanged.
 * - Error-like objects keep their message, name and stack.
 * - Other objects are stringified into the message.
 * - Primitives become the message.
 */
export function toError(err: unknown): Error {
    if (err instanceof Error) {
        return err;
    }

    if (err !== null && typeof err === 'object') {
        if ('message' in err) {
            const error = new Error(String(err.message));

            if ('stack' in err && typeof err.stack === 'string') {
                error.stack = err.stack;
            }
            if ('name' in err && typeof err.name === 'string') {
                error.name = err.name;
            }
            return error;
        }

        // JSON.stringify throws on cycles
        try {
            return new Error(`Non-Error object thrown: ${JSON.stringify(err)}`);
        } catch (stringifyErr: unknown) {
            //const error = toError(stringifyErr);
            // recursing into toError() here would not terminate on a cycle
            return new Error('Non-Error object thrown (unable to stringify)');
        }
    }

    if (err === null || err === undefined) {
        return new Error('Null or undefined thrown');
    }
    return new Error(String(err));
}

/**
 * Short description of an error for log lines: "<ClassName>: <message>".
 */
export function describeError(err: unknown): string {
    const error = toError(err);
    return `${error.constructor.name}: ${error.message}`;
}
