/**
 * Execution contexts: the unit that owns a log threshold.
 *
 * Each thread (main or worker) has one root context. Code can enter a named
 * task context with runInContext(); it follows the task across awaits, timers
 * and callbacks via AsyncLocalStorage.
 */
import { AsyncLocalStorage } from "node:async_hooks";
import { isMainThread, threadId } from "node:worker_threads";

export class ExecutionContext {
  /** Name printed in the thread field of each log line. */
  readonly name: string;

  constructor(name: string) {
    this.name = name;
  }
}

const storage = new AsyncLocalStorage<ExecutionContext>();

// Module state is per thread in Node, so this is the thread's own root.
let rootContext: ExecutionContext | null = null;

export function rootThreadName(): string {
  return isMainThread ? "main" : `worker-${threadId}`;
}

/** The active task context, or the thread's root context outside any task. */
export function currentContext(): ExecutionContext {
  const active = storage.getStore();
  if (active) return active;
  if (!rootContext) {
    rootContext = new ExecutionContext(rootThreadName());
  }
  return rootContext;
}

/**
 * Run `fn` in a fresh context named `name`.
 *
 * The new context starts with no threshold; nothing is inherited from the
 * context that entered it.
 */
export function runInContext<T>(name: string, fn: () => T): T {
  return storage.run(new ExecutionContext(name), fn);
}
