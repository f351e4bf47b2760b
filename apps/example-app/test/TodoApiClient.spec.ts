import 'reflect-metadata';
import {
    DecodeError,
    HttpNotFoundError,
    isPlainRecord,
    TransportConnectError,
} from '@restbind/http-api';
import {
    ClientConfig,
    FetchLike,
    FetchTransport,
    SyncHttpTransport,
    SyncRunner,
    SyncRunResult,
} from '@restbind/http-client';
import { ServiceStatus, Todo, User } from '../src/api';
import { TodoApiClient } from '../src/TodoApiClient';

interface Answer {
    status: number;
    statusText: string;
    payload: unknown;
}

interface WorkerInput {
    method: string;
    url: string;
    headers: unknown;
    bodyText?: string;
}

const ok = (payload: unknown): Answer => ({ status: 200, statusText: 'OK', payload });
const notFound = (message: string): Answer => ({ status: 404, statusText: 'Not Found', payload: { message } });

/**
 * In-memory stand-in for the todo service.
 */
function answer(method: string, url: string, bodyText?: string): Answer {
    switch (`${method} ${url}`) {
        case 'GET http://api.test/api/status':
            return ok({ healthy: true, version: '1.2.0' });
        case 'GET http://api.test/api/todos/1':
            return ok({ id: 1, title: 'Write docs', completed: false });
        case 'GET http://api.test/api/todos/2':
            return ok({ id: 2, title: '' });
        case 'GET http://api.test/api/todos?completed=false':
            return ok([
                { id: 1, title: 'Write docs', completed: false },
                { id: 4, title: 'Ship it', completed: false },
            ]);
        case 'POST http://api.test/api/todos':
            return {
                status: 201,
                statusText: 'Created',
                payload: { id: 3, completed: false, ...JSON.parse(bodyText ?? '{}') },
            };
        case 'GET http://api.test/api/users/5':
            return ok({ id: 5, name: 'Ada', email: 'ada@example.test' });
        default:
            return notFound(`${url} not found`);
    }
}

function readWorkerInput(input: string): WorkerInput {
    const parsed: unknown = JSON.parse(input);
    if (!isPlainRecord(parsed) || typeof parsed.method !== 'string' || typeof parsed.url !== 'string') {
        throw new Error(`unexpected worker input: ${input}`);
    }
    const bodyText = typeof parsed.body === 'string' ? Buffer.from(parsed.body, 'base64').toString('utf8') : undefined;
    return { method: parsed.method, url: parsed.url, headers: parsed.headers, bodyText };
}

describe('TodoApiClient', () => {
    let runner: jest.Mock<SyncRunResult, Parameters<SyncRunner>>;
    let mockFetch: jest.Mock<ReturnType<FetchLike>, Parameters<FetchLike>>;
    let api: TodoApiClient;

    beforeEach(() => {
        runner = jest.fn<SyncRunResult, Parameters<SyncRunner>>((input) => {
            const request = readWorkerInput(input);
            const reply = answer(request.method, request.url, request.bodyText);
            return {
                timedOut: false,
                exitCode: 0,
                stderr: '',
                stdout: JSON.stringify({
                    status: reply.status,
                    statusText: reply.statusText,
                    headers: { 'Content-Type': 'application/json' },
                    url: request.url,
                    body: Buffer.from(JSON.stringify(reply.payload)).toString('base64'),
                }),
            };
        });

        mockFetch = jest.fn<ReturnType<FetchLike>, Parameters<FetchLike>>(async (url, init) => {
            if (url === 'http://api.test/api/todos/9') {
                throw new TypeError('fetch failed');
            }
            const reply = answer(init.method ?? 'GET', url);
            return new Response(JSON.stringify(reply.payload), {
                status: reply.status,
                statusText: reply.statusText,
                headers: { 'Content-Type': 'application/json' },
            });
        });

        const config = new ClientConfig('http://api.test', {
            loggingEnabled: false,
            blockingTransport: () => new SyncHttpTransport(runner),
            nonBlockingTransport: () => new FetchTransport(mockFetch),
        });
        api = TodoApiClient.create(config);
    });

    it('should declare every route under /api, innermost decorator first', () => {
        expect(api.client.router.routes().map((route) => route.toString())).toEqual([
            'DELETE /api/todos/{id:int} -> Todo',
            'PUT /api/todos/{id:int} -> Todo',
            'POST /api/todos -> Todo',
            'GET /api/todos/{id:int} -> Todo',
            'GET /api/todos -> Todo[]',
            'GET /api/users/{userId:int} -> User',
            'GET /api/status -> ServiceStatus',
        ]);
    });

    it('should read the service status into a permissive model', () => {
        const status = api.status();

        expect(status).toBeInstanceOf(ServiceStatus);
        expect(status.healthy).toBe(true);
        expect(status.version).toBe('1.2.0');
    });

    it('should fetch a validated todo through the blocking transport', () => {
        const todo = api.getTodo(1);

        expect(todo).toBeInstanceOf(Todo);
        expect(todo).toEqual({ id: 1, title: 'Write docs', completed: false });
        expect(runner).toHaveBeenCalledTimes(1);
        expect(runner.mock.calls[0][1]).toBe(30_000);
        expect(api.client.scope).toBeUndefined();
    });

    it('should report a todo that fails validation', () => {
        try {
            api.getTodo(2);
            throw new Error('getTodo should have failed');
        } catch (err: unknown) {
            expect(err).toBeInstanceOf(DecodeError);
            if (err instanceof DecodeError) {
                expect(err.message).toContain('Error trying to retrieve http://api.test/api/todos/2');
                expect(err.violations).toContain('title must be longer than or equal to 1 characters');
                expect(err.violations).toContain('completed must be a boolean value');
            }
        }
        expect(api.client.scope).toBeUndefined();
    });

    it('should raise the HttpError of a missing todo', () => {
        expect(() => api.getTodo(7)).toThrow(HttpNotFoundError);
        expect(() => api.getTodo(7)).toThrow('http://api.test/api/todos/7 not found');
    });

    it('should list todos with the query filter', () => {
        const todos = api.listTodos(false);

        expect(todos.map((todo) => todo.title)).toEqual(['Write docs', 'Ship it']);
        expect(todos.every((todo) => todo instanceof Todo)).toBe(true);
    });

    it('should post the new todo as JSON', () => {
        const created = api.createTodo({ title: 'Try restbind' });

        expect(created).toEqual({ id: 3, title: 'Try restbind', completed: false });
        const sent = readWorkerInput(runner.mock.calls[0][0]);
        expect(sent.method).toBe('POST');
        expect(sent.bodyText).toBe('{"title":"Try restbind"}');
        expect(sent.headers).toEqual({ 'content-type': 'application/json' });
    });

    it('should build users through their fromJson hook', () => {
        const user = api.getUser(5);

        expect(user).toBeInstanceOf(User);
        expect(user.email).toBe('ada@example.test');
    });

    it('should fetch a batch concurrently and keep each outcome in order', async () => {
        const results = await api.fetchTodos([1, 7, 9]);

        expect(results).toHaveLength(3);
        expect(results[0]).toBeInstanceOf(Todo);
        expect(results[1]).toBeInstanceOf(HttpNotFoundError);
        expect(results[2]).toBeInstanceOf(TransportConnectError);
        expect(mockFetch).toHaveBeenCalledTimes(3);
        expect(runner).not.toHaveBeenCalled();
        expect(api.client.scope).toBeUndefined();
    });
});
