import { StreamError, errorMessage } from "../lib/errors.js";
import type { Subscription, SubscriptionData } from "./types.js";

type Settled =
  | { index: number; ok: true; value: SubscriptionData | undefined }
  | { index: number; ok: false; error: unknown };

function toStreamError(error: unknown, subscription: Subscription): StreamError {
  if (error instanceof StreamError) return error;
  return new StreamError(`Subscription for ${subscription.root.path} failed: ${errorMessage(error)}`, {
    cause: error,
    root: subscription.root.path,
  });
}

/**
 * Fan-in over a fixed set of subscriptions.
 *
 * Each branch has at most one outstanding `next()`, so a root's payloads come
 * out in the order that root produced them; there is no ordering across roots.
 * A branch that ends is dropped and the merge ends once every branch has.
 * The first branch failure ends the merge with a StreamError.
 *
 * Does not close the subscriptions; the owner does that.
 */
export async function* mergeSubscriptions(
  subscriptions: readonly Subscription[],
): AsyncGenerator<SubscriptionData, void, undefined> {
  const pending = new Map<number, Promise<Settled>>();

  const arm = (index: number, subscription: Subscription): void => {
    pending.set(
      index,
      subscription.next().then(
        (value): Settled => ({ index, ok: true, value }),
        (error: unknown): Settled => ({ index, ok: false, error }),
      ),
    );
  };

  subscriptions.forEach((subscription, index) => arm(index, subscription));

  while (pending.size > 0) {
    const settled = await Promise.race(pending.values());
    pending.delete(settled.index);

    const subscription = subscriptions[settled.index];
    if (!subscription) continue;

    if (!settled.ok) {
      throw toStreamError(settled.error, subscription);
    }
    if (settled.value === undefined) continue;

    yield settled.value;
    arm(settled.index, subscription);
  }
}
