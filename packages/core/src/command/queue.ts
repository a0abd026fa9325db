export type Scheduler = (task: () => void) => void;

export const scheduleImmediate: Scheduler = (task) => {
  setImmediate(task);
};

export interface EventQueue<T> {
  post(items: readonly T[]): void;
  pending(): number;
}

export interface EventQueueOptions {
  schedule?: Scheduler;
  onError?: (error: unknown) => void;
}

/**
 * Single-consumer queue: items are delivered in posting order on a later tick.
 * A consumer that returns a promise is not awaited; its rejection goes to `onError`.
 */
export const createEventQueue = <T>(
  consume: (item: T) => void | Promise<void>,
  options: EventQueueOptions = {}
): EventQueue<T> => {
  const schedule = options.schedule ?? scheduleImmediate;
  const items: T[] = [];
  let scheduled = false;

  const report = (error: unknown) => {
    options.onError?.(error);
  };

  const drain = () => {
    scheduled = false;
    items.splice(0, items.length).forEach((item) => {
      try {
        const result = consume(item);
        if (result instanceof Promise) result.catch(report);
      } catch (error) {
        report(error);
      }
    });
  };

  return {
    post: (next) => {
      if (!next.length) return;
      items.push(...next);
      if (scheduled) return;
      scheduled = true;
      schedule(drain);
    },
    pending: () => items.length,
  };
};
