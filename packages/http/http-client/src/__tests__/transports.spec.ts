import {
    bytesToText,
    textToBytes,
    TransportConnectError,
    TransportError,
    TransportReadError,
    TransportTimeoutError,
} from '@restbind/http-api';
import { FetchLike, FetchTransport } from '../transports/FetchTransport';
import { SyncHttpTransport, SyncRunner, SyncRunResult } from '../transports/SyncHttpTransport';
import { TransportRequest } from '../transports/Transport';

const request: TransportRequest = {
    method: 'POST',
    url: 'http://api.test/todos',
    headers: { 'content-type': 'application/json', 'x-tenant': 'acme' },
    body: textToBytes('{"title":"x"}'),
};

describe('FetchTransport', () => {
    it('should send through fetch and collect the response', async () => {
        const fetchImpl = jest.fn<ReturnType<FetchLike>, Parameters<FetchLike>>(async () =>
            new Response('{"id":1}', {
                status: 201,
                statusText: 'Created',
                headers: { 'Content-Type': 'application/json' },
            }),
        );
        const transport = new FetchTransport(fetchImpl);
        const controller = new AbortController();

        const raw = await transport.send(request, controller.signal);

        expect(raw.status).toBe(201);
        expect(raw.statusText).toBe('Created');
        expect(raw.headers['content-type']).toBe('application/json');
        expect(bytesToText(raw.body)).toBe('{"id":1}');
        expect(raw.url).toBe('http://api.test/todos');

        expect(fetchImpl).toHaveBeenCalledTimes(1);
        const [url, init] = fetchImpl.mock.calls[0];
        expect(url).toBe('http://api.test/todos');
        expect(init.method).toBe('POST');
        expect(init.headers).toEqual({ 'content-type': 'application/json', 'x-tenant': 'acme' });
        expect(init.body).toBe(request.body);
        expect(init.signal).toBe(controller.signal);
    });

    it('should turn fetch failures into TransportConnectError', async () => {
        const transport = new FetchTransport(async () => {
            throw new TypeError('fetch failed');
        });

        await expect(transport.send(request, new AbortController().signal)).rejects.toThrow(
            new TransportConnectError('Cannot reach http://api.test/todos: fetch failed'),
        );
    });

    it('should refuse to send once closed', async () => {
        const fetchImpl = jest.fn<ReturnType<FetchLike>, Parameters<FetchLike>>();
        const transport = new FetchTransport(fetchImpl);
        await transport.close();

        await expect(transport.send(request, new AbortController().signal)).rejects.toThrow(TransportError);
        expect(fetchImpl).not.toHaveBeenCalled();
    });
});

describe('SyncHttpTransport', () => {
    function runnerReturning(result: Partial<SyncRunResult>): jest.Mock<SyncRunResult, Parameters<SyncRunner>> {
        return jest.fn<SyncRunResult, Parameters<SyncRunner>>(() => ({
            timedOut: false,
            exitCode: 0,
            stdout: '',
            stderr: '',
            ...result,
        }));
    }

    it('should hand the request to the worker and parse its reply', () => {
        const reply = {
            status: 200,
            statusText: 'OK',
            headers: { 'Content-Type': 'application/json' },
            url: 'http://api.test/todos',
            body: Buffer.from('{"id":1}').toString('base64'),
        };
        const runner = runnerReturning({ stdout: JSON.stringify(reply) });
        const transport = new SyncHttpTransport(runner);

        const raw = transport.send(request, 1500);

        expect(raw.status).toBe(200);
        expect(raw.headers).toEqual({ 'content-type': 'application/json' });
        expect(bytesToText(raw.body)).toBe('{"id":1}');

        const [input, timeoutMs] = runner.mock.calls[0];
        expect(timeoutMs).toBe(1500);
        expect(JSON.parse(input)).toEqual({
            method: 'POST',
            url: 'http://api.test/todos',
            headers: { 'content-type': 'application/json', 'x-tenant': 'acme' },
            body: Buffer.from('{"title":"x"}').toString('base64'),
        });
    });

    it('should raise TransportTimeoutError when the worker is killed', () => {
        const transport = new SyncHttpTransport(runnerReturning({ timedOut: true, exitCode: null }));

        try {
            transport.send(request, 250);
            throw new Error('send should have failed');
        } catch (err: unknown) {
            expect(err).toBeInstanceOf(TransportTimeoutError);
            if (err instanceof TransportTimeoutError) {
                expect(err.timeoutMs).toBe(250);
                expect(err.message).toBe('POST http://api.test/todos timed out after 250ms');
            }
        }
    });

    it('should report connection failures', () => {
        const stdout = JSON.stringify({ failure: 'connect', message: 'connect ECONNREFUSED 127.0.0.1:9' });
        const transport = new SyncHttpTransport(runnerReturning({ stdout }));

        expect(() => transport.send(request, 1000)).toThrow(
            new TransportConnectError('Cannot reach http://api.test/todos: connect ECONNREFUSED 127.0.0.1:9'),
        );
    });

    it('should report read failures', () => {
        const stdout = JSON.stringify({ failure: 'read', message: 'terminated' });
        const transport = new SyncHttpTransport(runnerReturning({ stdout }));

        expect(() => transport.send(request, 1000)).toThrow(TransportReadError);
    });

    it('should report an oversized reply as a read failure', () => {
        const overflow = Object.assign(new Error('spawnSync node ENOBUFS'), { code: 'ENOBUFS' });
        const transport = new SyncHttpTransport(runnerReturning({ exitCode: null, error: overflow }));

        expect(() => transport.send(request, 1000)).toThrow(
            new TransportReadError('Reply from the request worker for http://api.test/todos exceeded 67108864 bytes'),
        );
    });

    it('should report a worker that could not start as a connection failure', () => {
        const missing = Object.assign(new Error('spawnSync node ENOENT'), { code: 'ENOENT' });
        const transport = new SyncHttpTransport(runnerReturning({ exitCode: null, error: missing }));

        expect(() => transport.send(request, 1000)).toThrow(TransportConnectError);
    });

    it('should report a worker that crashed', () => {
        const transport = new SyncHttpTransport(runnerReturning({ exitCode: 1, stderr: 'boom\n' }));

        expect(() => transport.send(request, 1000)).toThrow(
            new TransportError('Request worker for http://api.test/todos exited with code 1: boom'),
        );
    });

    it('should report an unreadable reply', () => {
        const transport = new SyncHttpTransport(runnerReturning({ stdout: '{"status":"200"}' }));

        expect(() => transport.send(request, 1000)).toThrow(
            new TransportReadError('Incomplete reply from the request worker for http://api.test/todos'),
        );
    });

    it('should refuse to send once closed', () => {
        const runner = runnerReturning({});
        const transport = new SyncHttpTransport(runner);
        transport.close();

        expect(() => transport.send(request, 1000)).toThrow(TransportError);
        expect(runner).not.toHaveBeenCalled();
    });
});
