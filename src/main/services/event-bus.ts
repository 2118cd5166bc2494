import {
  RESPONSE_TYPES,
  type AsyncMessage,
  type AsyncMessageOf,
  type AsyncMessageType,
  type SyncNotification,
  type SyncNotificationOf,
  type SyncNotificationType,
  type SyncRequest,
  type SyncRequestOf,
  type SyncRequestType,
  type SyncResponse,
  type SyncResponseFor
} from "../../shared/messages.js";

/**
 * Where a subscriber's deliveries run. Every subscription drains its own queue
 * through the context it registered with.
 */
export type DispatchContext = (task: () => void) => void;

export const immediateContext: DispatchContext = (task) => {
  setImmediate(task);
};

export const microtaskContext: DispatchContext = (task) => {
  queueMicrotask(task);
};

interface AsyncSubscription {
  type: AsyncMessageType;
  context: DispatchContext;
  pending: AsyncMessage[];
  scheduled: boolean;
  deliver(message: AsyncMessage): void;
}

type RequestHandler = (request: SyncRequest) => SyncResponse;

type NotificationListener = (notification: SyncNotification) => void;

function isAsyncMessageOf<K extends AsyncMessageType>(message: AsyncMessage, type: K): message is AsyncMessageOf<K> {
  return message.type === type;
}

function isSyncRequestOf<K extends SyncRequestType>(request: SyncRequest, type: K): request is SyncRequestOf<K> {
  return request.type === type;
}

function isSyncNotificationOf<K extends SyncNotificationType>(
  notification: SyncNotification,
  type: K
): notification is SyncNotificationOf<K> {
  return notification.type === type;
}

function describeType(message: { type: string }): string {
  return message.type;
}

/**
 * Process-wide message hub, created once by the app controller and handed to
 * every component that publishes or subscribes.
 *
 * The synchronous side (requests and notifications) runs handlers on the
 * caller's stack. The asynchronous side queues each message per subscriber and
 * returns immediately.
 */
export class EventBus {
  private readonly subscriptions = new Map<AsyncMessageType, AsyncSubscription[]>();
  private readonly requestHandlers = new Map<SyncRequestType, RequestHandler>();
  private readonly notificationListeners = new Map<SyncNotificationType, NotificationListener[]>();
  private pendingDeliveries = 0;
  private idleWaiters: Array<() => void> = [];

  public subscribe<K extends AsyncMessageType>(
    type: K,
    listener: (message: AsyncMessageOf<K>) => void,
    context: DispatchContext = immediateContext
  ): () => void {
    const subscription: AsyncSubscription = {
      type,
      context,
      pending: [],
      scheduled: false,
      deliver: (message) => {
        if (isAsyncMessageOf(message, type)) {
          listener(message);
        }
      }
    };

    // Copy on write: a publish that is iterating the old array is unaffected.
    this.subscriptions.set(type, [...(this.subscriptions.get(type) ?? []), subscription]);

    return () => {
      const current = this.subscriptions.get(type) ?? [];
      this.subscriptions.set(type, current.filter((candidate) => candidate !== subscription));
    };
  }

  public publish(message: AsyncMessage): void {
    const targets = this.subscriptions.get(message.type);
    if (!targets) {
      return;
    }

    for (const subscription of targets) {
      subscription.pending.push(message);
      this.pendingDeliveries += 1;
      this.scheduleDrain(subscription);
    }
  }

  public handleRequest<K extends SyncRequestType>(
    type: K,
    handler: (request: SyncRequestOf<K>) => SyncResponseFor<K>
  ): () => void {
    if (this.requestHandlers.has(type)) {
      throw new Error(`A handler is already registered for "${type}" requests.`);
    }

    const wrapped: RequestHandler = (request) => {
      if (isSyncRequestOf(request, type)) {
        return handler(request);
      }
      throw new Error(`Handler for "${type}" received a "${describeType(request)}" request.`);
    };

    this.requestHandlers.set(type, wrapped);

    return () => {
      if (this.requestHandlers.get(type) === wrapped) {
        this.requestHandlers.delete(type);
      }
    };
  }

  /**
   * Runs the single handler registered for the request's type. Returns `null`
   * when nobody handles it.
   */
  public publishRequest(request: SyncRequestOf<"appExit">): SyncResponseFor<"appExit"> | null;
  public publishRequest(request: SyncRequestOf<"stopPlayback" | "removeTrack">): SyncResponseFor<"stopPlayback"> | null;
  public publishRequest(request: SyncRequest): SyncResponse | null {
    const handler = this.requestHandlers.get(request.type);
    if (!handler) {
      return null;
    }

    const response = handler(request);
    const expected: SyncResponse["type"] = RESPONSE_TYPES[request.type];
    if (response.type !== expected) {
      throw new Error(`Handler for "${request.type}" returned a "${response.type}" response.`);
    }

    return response;
  }

  public subscribeNotification<K extends SyncNotificationType>(
    type: K,
    listener: (notification: SyncNotificationOf<K>) => void
  ): () => void {
    const wrapped: NotificationListener = (notification) => {
      if (isSyncNotificationOf(notification, type)) {
        listener(notification);
      }
    };

    this.notificationListeners.set(type, [...(this.notificationListeners.get(type) ?? []), wrapped]);

    return () => {
      const current = this.notificationListeners.get(type) ?? [];
      this.notificationListeners.set(type, current.filter((candidate) => candidate !== wrapped));
    };
  }

  public publishNotification(notification: SyncNotification): void {
    const listeners = this.notificationListeners.get(notification.type) ?? [];
    for (const listener of listeners) {
      try {
        listener(notification);
      } catch (error) {
        console.error(`Listener for "${notification.type}" notification failed:`, error);
      }
    }
  }

  /**
   * Resolves once every queued asynchronous delivery has run, including the
   * ones queued by listeners while draining.
   */
  public whenIdle(): Promise<void> {
    if (this.pendingDeliveries === 0) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  public shutdown(): void {
    this.subscriptions.clear();
    this.requestHandlers.clear();
    this.notificationListeners.clear();
  }

  private scheduleDrain(subscription: AsyncSubscription): void {
    if (subscription.scheduled) {
      return;
    }

    subscription.scheduled = true;
    subscription.context(() => {
      this.drain(subscription);
    });
  }

  private drain(subscription: AsyncSubscription): void {
    subscription.scheduled = false;

    let message = subscription.pending.shift();
    while (message) {
      try {
        subscription.deliver(message);
      } catch (error) {
        console.error(`Subscriber for "${subscription.type}" failed:`, error);
      } finally {
        this.pendingDeliveries -= 1;
      }
      message = subscription.pending.shift();
    }

    this.resolveIdleWaiters();
  }

  private resolveIdleWaiters(): void {
    if (this.pendingDeliveries > 0 || this.idleWaiters.length === 0) {
      return;
    }

    const waiters = [...this.idleWaiters];
    this.idleWaiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}
