import type { RawNotification } from "../effect/types.ts";

export type NotificationListener = (notification: RawNotification) => void;

export interface Subscription {
  /** Resolves once no further notification can be delivered. */
  close(): Promise<void>;
}

/**
 * Delivers recursive filesystem notifications for a root. `subscribe` resolves
 * when the source is ready.
 */
export interface NotificationSource {
  subscribe(root: string, listener: NotificationListener): Promise<Subscription>;
}
