import type { Debugger } from 'debug';
import debug from 'debug';

/**
 * Debug logger for connections and schema bootstrap (`DEBUG=revision-log:db`)
 */
export const dbLog: Debugger = debug('revision-log:db');
