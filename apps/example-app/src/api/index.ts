export { Todo, NewTodo } from './Todo';
export { User } from './User';
export { ServiceStatus } from './ServiceStatus';

import { ClientRouter } from '@restbind/http-routing';
import { statusRouter, todoRouter, userRouter } from './routers';

/**
 * Every route of the example API. Built after the modules above have
 * registered their types, since include() copies the routes present at that time.
 */
export const apiRouter = new ClientRouter();
apiRouter.include(todoRouter);
apiRouter.include(userRouter);
apiRouter.include(statusRouter);
