import debug from 'debug';

// Base namespace for the project
const BASE_NAMESPACE = 'sqlcomposer';

/**
 * Creates a namespaced debug logger instance.
 *
 * Example: createLogger('compile') -> returns a debugger for 'sqlcomposer:compile'
 *
 * Usage:
 * const log = createLogger('rewrite');
 * log('Collapsed NOT over %s', kind);
 * const errorLog = log.extend('error'); // Creates 'sqlcomposer:rewrite:error'
 * errorLog('Rewrite failed: %O', error);
 *
 * @param subNamespace The specific subsystem namespace (e.g., 'compile', 'rewrite')
 */
export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}
