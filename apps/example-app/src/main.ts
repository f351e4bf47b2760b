import 'reflect-metadata';
import { toError } from '@restbind/core-util';
import { ClientConfig } from '@restbind/http-client';
import { TodoApiClient } from './TodoApiClient';

/**
 * Walks the example API once: a status check, a few blocking calls and a
 * concurrent batch. Reads RESTBIND_BASE_URL (and friends) from the environment.
 */
async function main(): Promise<void> {
    console.log('[Example] Reading client configuration from the environment...');
    const api = TodoApiClient.create(ClientConfig.fromEnv());

    const status = api.status();
    console.log(`[Example] Service healthy=${status.healthy} version=${status.version}`);

    const created = api.createTodo({ title: 'Try restbind' });
    console.log(`[Example] Created todo ${created.id}: ${created.title}`);

    const open = api.listTodos(false);
    console.log(`[Example] ${open.length} open todo(s)`);

    const results = await api.fetchTodos([created.id, created.id + 1000]);
    results.forEach((result, index) => {
        if (result instanceof Error) {
            console.log(`[Example] #${index} failed: ${result.message}`);
        } else {
            console.log(`[Example] #${index} ${result.title} completed=${result.completed}`);
        }
    });
}

if (require.main === module) {
    main().catch((err: unknown) => {
        console.error('[Example] Error while calling the API:', toError(err).message);
        process.exitCode = 1;
    });
}

export { main };
