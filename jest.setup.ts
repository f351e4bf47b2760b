/**
 * Replaces Jest's buffered console with a plain Node console.
 *
 * Jest prints every console call with a stack frame:
 *
 *   console.log
 *     [API-CLIENT-req] Todo GET http://localhost:3000/todos/1 ...
 *
 *       at LogApiCall.logRequest (LogApiCall.ts:42:17)
 *
 * The plain console only prints the line itself.
 */
import { Console } from 'console';

global.console = new Console(process.stdout, process.stderr);
