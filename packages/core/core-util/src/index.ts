/**
 * @restbind/core-util
 *
 * Lowest-level helpers shared by every restbind package.
 *
 * @packageDocumentation
 */

export { toError, describeError } from './lib/errorUtils';
