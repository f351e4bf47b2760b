import { toError } from '@restbind/core-util';
import { ClientConfig, RestClient } from '@restbind/http-client';
import { apiRouter, NewTodo, ServiceStatus, Todo, User } from './api';

/**
 * TodoApiClient - Typed calls over a RestClient bound to the example API.
 *
 * Single calls run in their own blocking scope; batches share one non-blocking
 * scope and report each id's outcome in order.
 */
export class TodoApiClient {
    constructor(readonly client: RestClient) {}

    static create(config: ClientConfig): TodoApiClient {
        return new TodoApiClient(new RestClient(config).includeRouter(apiRouter, '/api'));
    }

    status(): ServiceStatus {
        return this.client.withBlocking((scope) =>
            scope.get('/api/status').response().raiseForStatus().objectOf(ServiceStatus),
        );
    }

    getTodo(id: number): Todo {
        return this.client.withBlocking((scope) =>
            scope.get('/api/todos/{id}', { path: { id } }).response().raiseForStatus().objectOf(Todo),
        );
    }

    listTodos(completed?: boolean): Todo[] {
        return this.client.withBlocking((scope) =>
            scope.get('/api/todos', { query: { completed } }).response().raiseForStatus().listOf(Todo),
        );
    }

    createTodo(todo: NewTodo): Todo {
        return this.client.withBlocking((scope) =>
            scope.post('/api/todos', { body: todo }).response().raiseForStatus().objectOf(Todo),
        );
    }

    getUser(userId: number): User {
        return this.client.withBlocking((scope) =>
            scope.get(`/api/users/${userId}`).response().raiseForStatus().objectOf(User),
        );
    }

    /**
     * Fetches every id concurrently. A failed id yields its Error in place of a Todo.
     */
    async fetchTodos(ids: readonly number[]): Promise<Array<Todo | Error>> {
        return this.client.withNonBlocking(async (scope) => {
            const results = await scope.gather(ids.map((id) => scope.get('/api/todos/{id}', { path: { id } })));
            return results.map((result): Todo | Error => {
                if (!result.ok) {
                    return result.error;
                }
                try {
                    return result.response.raiseForStatus().objectOf(Todo);
                } catch (err: unknown) {
                    return toError(err);
                }
            });
        });
    }
}
