import { spawnSync } from 'child_process';
import { toError } from '@restbind/core-util';
import {
    isPlainRecord,
    TransportConnectError,
    TransportError,
    TransportReadError,
    TransportTimeoutError,
} from '@restbind/http-api';
import { BlockingTransport, RawResponse, TransportRequest } from './Transport';

/**
 * Outcome of running the request worker once.
 */
export interface SyncRunResult {
    timedOut: boolean;
    exitCode: number | null;
    stdout: string;
    stderr: string;
    /** Set when the worker could not be started, or its reply overflowed the output buffer (code ENOBUFS). */
    error?: Error;
}

/**
 * Runs the worker with `input` on stdin and waits for it to finish.
 */
export type SyncRunner = (input: string, timeoutMs: number) => SyncRunResult;

/**
 * Worker run in a child Node process: reads one request as JSON from stdin,
 * performs it with fetch and writes the reply as JSON to stdout.
 */
const WORKER_SCRIPT = `
let input = '';
process.stdin.setEncoding('utf8');
process.stdin.on('data', (chunk) => { input += chunk; });
process.stdin.on('end', async () => {
    const req = JSON.parse(input);
    const write = (reply) => process.stdout.write(JSON.stringify(reply));
    const reason = (err) => (err && err.cause && err.cause.message) || (err && err.message) || String(err);
    let res;
    try {
        res = await fetch(req.url, {
            method: req.method,
            headers: req.headers,
            body: req.body === undefined ? undefined : Buffer.from(req.body, 'base64'),
        });
    } catch (err) {
        write({ failure: 'connect', message: reason(err) });
        return;
    }
    try {
        const body = Buffer.from(await res.arrayBuffer()).toString('base64');
        const headers = {};
        res.headers.forEach((value, name) => { headers[name] = value; });
        write({ status: res.status, statusText: res.statusText, headers, url: res.url, body });
    } catch (err) {
        write({ failure: 'read', message: reason(err) });
    }
});
`;

const MAX_REPLY_BYTES = 64 * 1024 * 1024;

function hasCode(error: Error | undefined, code: string): boolean {
    return error !== undefined && 'code' in error && error.code === code;
}

/**
 * Default runner: a child `node -e` process, killed when the timeout expires.
 */
export const spawnWorker: SyncRunner = (input, timeoutMs) => {
    const result = spawnSync(process.execPath, ['-e', WORKER_SCRIPT], {
        input,
        timeout: timeoutMs,
        encoding: 'utf8',
        maxBuffer: MAX_REPLY_BYTES,
    });
    const timedOut = hasCode(result.error, 'ETIMEDOUT');
    return {
        timedOut,
        exitCode: result.status,
        stdout: result.stdout ?? '',
        stderr: result.stderr ?? '',
        error: timedOut ? undefined : result.error,
    };
};

function stringRecord(value: unknown): Record<string, string> | undefined {
    if (!isPlainRecord(value)) {
        return undefined;
    }
    const record: Record<string, string> = {};
    for (const [name, entry] of Object.entries(value)) {
        if (typeof entry !== 'string') {
            return undefined;
        }
        record[name.toLowerCase()] = entry;
    }
    return record;
}

/**
 * SyncHttpTransport - Blocking transport.
 *
 * Each send() runs fetch in a short-lived child process and blocks the caller
 * until the child exits, so calls happen strictly in program order.
 */
export class SyncHttpTransport implements BlockingTransport {
    private closed = false;

    constructor(private readonly runner: SyncRunner = spawnWorker) {}

    send(request: TransportRequest, timeoutMs: number): RawResponse {
        if (this.closed) {
            throw new TransportError(`Transport is closed; cannot send ${request.method} ${request.url}`);
        }

        const input = JSON.stringify({
            method: request.method,
            url: request.url,
            headers: request.headers,
            body: request.body === undefined ? undefined : Buffer.from(request.body).toString('base64'),
        });
        const result = this.runner(input, timeoutMs);

        if (result.timedOut) {
            throw new TransportTimeoutError(
                `${request.method} ${request.url} timed out after ${timeoutMs}ms`,
                timeoutMs,
            );
        }
        if (hasCode(result.error, 'ENOBUFS')) {
            throw new TransportReadError(
                `Reply from the request worker for ${request.url} exceeded ${MAX_REPLY_BYTES} bytes`,
                result.error,
            );
        }
        if (result.error) {
            throw new TransportConnectError(
                `Cannot start the request worker for ${request.url}: ${result.error.message}`,
                result.error,
            );
        }
        if (result.exitCode !== 0) {
            throw new TransportError(
                `Request worker for ${request.url} exited with code ${String(result.exitCode)}: ${result.stderr.trim()}`,
            );
        }
        return this.parseReply(request, result.stdout);
    }

    close(): void {
        this.closed = true;
    }

    private parseReply(request: TransportRequest, stdout: string): RawResponse {
        let reply: unknown;
        try {
            reply = JSON.parse(stdout);
        } catch (err: unknown) {
            const error = toError(err);
            throw new TransportReadError(
                `Unreadable reply from the request worker for ${request.url}: ${error.message}`,
                error,
            );
        }
        if (!isPlainRecord(reply)) {
            throw new TransportReadError(`Unreadable reply from the request worker for ${request.url}`);
        }

        if (reply.failure === 'connect') {
            throw new TransportConnectError(`Cannot reach ${request.url}: ${String(reply.message)}`);
        }
        if (reply.failure === 'read') {
            throw new TransportReadError(`Failed reading the response of ${request.url}: ${String(reply.message)}`);
        }

        const headers = stringRecord(reply.headers);
        const { status, statusText, url, body } = reply;
        if (
            typeof status !== 'number' ||
            typeof statusText !== 'string' ||
            typeof url !== 'string' ||
            typeof body !== 'string' ||
            !headers
        ) {
            throw new TransportReadError(`Incomplete reply from the request worker for ${request.url}`);
        }
        return {
            status,
            statusText,
            headers,
            body: new Uint8Array(Buffer.from(body, 'base64')),
            url: url || request.url,
        };
    }
}
