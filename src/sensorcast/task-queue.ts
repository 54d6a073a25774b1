import { AsyncLocalStorage } from "node:async_hooks";

/**
 * hardware: sensor, location and scan callbacks.
 * touch: touch input, kept apart so a burst of sensor work never delays it.
 */
export type TaskLane = "hardware" | "touch";

export type SerialTaskQueue = {
  run<T>(lane: TaskLane, task: () => T | Promise<T>): Promise<T>;
  drain(): Promise<void>;
  pending(lane: TaskLane): boolean;
};

/**
 * Runs tasks of one lane strictly one after another, in submission order.
 * Different lanes never wait on each other. A task submitted from inside a
 * task of the same lane runs inline instead of deadlocking behind itself.
 */
export function createSerialTaskQueue(params?: {
  onTaskError?: (lane: TaskLane, err: unknown) => void;
}): SerialTaskQueue {
  const tails = new Map<TaskLane, Promise<unknown>>();
  const context = new AsyncLocalStorage<TaskLane>();
  const onTaskError = params?.onTaskError;

  function run<T>(lane: TaskLane, task: () => T | Promise<T>): Promise<T> {
    if (context.getStore() === lane) {
      return Promise.resolve().then(task);
    }
    const previous = tails.get(lane) ?? Promise.resolve();
    const next = previous
      .catch((err: unknown) => {
        onTaskError?.(lane, err);
      })
      .then(() => context.run(lane, task))
      .finally(() => {
        if (tails.get(lane) === next) {
          tails.delete(lane);
        }
      });
    tails.set(lane, next);
    return next;
  }

  async function drain() {
    await Promise.allSettled(Array.from(tails.values()));
  }

  return {
    run,
    drain,
    pending: (lane) => tails.has(lane),
  };
}
