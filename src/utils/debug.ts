/**
 * Namespaced debug loggers. Enable with `DEBUG=boxsim:*`.
 */

import Debug from 'debug';
import type { Debugger } from 'debug';

export type Logger = Debugger;

export function createLogger(scope: string): Logger {
  return Debug(`boxsim:${scope}`);
}
