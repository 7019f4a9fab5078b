/**
 * Result delivery
 *
 * Results reach the caller through a DeliveryContext chosen when the
 * client is built. The returned promise settles from inside the task the
 * context runs, once, and never in the same tick as the call.
 */

import type { DeliveryContext } from "./types.js";

/** Delivers on the check phase of the event loop. */
export const immediateDelivery: DeliveryContext = {
  schedule(task) {
    setImmediate(task);
  },
};

/** Delivers on the microtask queue. */
export const microtaskDelivery: DeliveryContext = {
  schedule(task) {
    queueMicrotask(task);
  },
};

export type Completion<T> = (result: T) => void;

/**
 * Hands `result` to the caller on `context`. `completion`, when given, runs
 * in the same task, before the promise settles.
 */
export function deliver<T>(
  context: DeliveryContext,
  result: T,
  completion?: Completion<T>
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let delivered = false;
    context.schedule(() => {
      if (delivered) {
        return;
      }
      delivered = true;
      try {
        completion?.(result);
      } catch (error) {
        reject(error);
        return;
      }
      resolve(result);
    });
  });
}
