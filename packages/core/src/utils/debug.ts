/**
 * Debug logging utilities using the `debug` package
 *
 * Enable logging by setting the DEBUG environment variable.
 *
 * @example Environment variable configuration
 * ```bash
 * # Enable all revision log output
 * DEBUG=revision-log:* node app.js
 *
 * # Enable specific namespaces
 * DEBUG=revision-log:store npm test
 * DEBUG=revision-log:core npm start
 * ```
 */

import type { Debugger } from 'debug';
import debug from 'debug';

/**
 * Debug logger for the save hook and history query
 */
export const coreLog: Debugger = debug('revision-log:core');

/**
 * Debug logger for store adapters (appends, listings, transactions)
 */
export const storeLog: Debugger = debug('revision-log:store');

/**
 * Debug logger for tree construction
 */
export const treeLog: Debugger = debug('revision-log:tree');
