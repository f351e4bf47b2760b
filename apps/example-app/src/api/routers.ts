import { ClientRouter } from '@restbind/http-routing';

/**
 * One router per resource; each declares its paths relative to its prefix.
 */
export const todoRouter = new ClientRouter({ prefix: '/todos' });
export const userRouter = new ClientRouter({ prefix: '/users' });
export const statusRouter = new ClientRouter();
