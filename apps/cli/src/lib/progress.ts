import ora from 'ora';
import { lifecycleLog } from './debug-logger.js';
import { errorMessage } from './errors.js';

export interface LifecycleTracker<S extends string> {
  enter(state: S, text: string): void;
  finish(state: S): void;
  fail(state: S, err: unknown): void;
}

/**
 * Spinner plus a debug-log line for every state a lifecycle operation passes through.
 */
export function trackLifecycle<S extends string>(
  operation: string,
  initial: S,
  text: string,
): LifecycleTracker<S> {
  const spinner = ora(text).start();
  const log = lifecycleLog.child({ operation });
  let current: S = initial;
  log.debug({ state: initial }, 'Enter state');

  return {
    enter(state, nextText) {
      log.debug({ from: current, state }, 'Enter state');
      current = state;
      spinner.text = nextText;
    },
    finish(state) {
      log.info({ from: current, state }, 'Finished');
      current = state;
      spinner.stop();
    },
    fail(state, err) {
      log.warn({ from: current, state, err: errorMessage(err) }, 'Failed');
      spinner.fail(`${operation} stopped while ${current.toLowerCase()}`);
      current = state;
    },
  };
}
