import { EventEmitter } from "events";

export interface EventPayload {
  type: string;
  data: unknown;
  timestamp: string;
  source: string;
}

export type EventHandler = (payload: EventPayload) => void | Promise<void>;

/**
 * Event bus for in-process engine notifications
 */
export class EventBus extends EventEmitter {
  private eventHistory: EventPayload[] = [];

  constructor(private readonly maxHistorySize = 200) {
    super();
  }

  /**
   * Publish an event
   */
  publish(type: string, data: unknown, source = "engine"): void {
    const payload: EventPayload = {
      type,
      data,
      timestamp: new Date().toISOString(),
      source,
    };

    this.addToHistory(payload);
    this.emit(type, payload);
    // Generic channel for listeners who want every event
    this.emit("event", payload);

    console.log(`📢 Event published: ${type} from ${source}`);
  }

  subscribe(type: string, handler: EventHandler): void {
    this.on(type, handler);
  }

  unsubscribe(type: string, handler: EventHandler): void {
    this.off(type, handler);
  }

  subscribeAll(handler: EventHandler): void {
    this.on("event", handler);
  }

  /**
   * Get event history
   */
  getHistory(filter?: {
    type?: string;
    source?: string;
    limit?: number;
  }): EventPayload[] {
    let history = [...this.eventHistory];

    if (filter?.type) {
      history = history.filter((e) => e.type === filter.type);
    }
    if (filter?.source) {
      history = history.filter((e) => e.source === filter.source);
    }
    if (filter?.limit) {
      history = history.slice(-filter.limit);
    }

    return history;
  }

  clearHistory(): void {
    this.eventHistory = [];
  }

  private addToHistory(payload: EventPayload): void {
    this.eventHistory.push(payload);
    if (this.eventHistory.length > this.maxHistorySize) {
      this.eventHistory.shift();
    }
  }

  getStats(): {
    totalEvents: number;
    eventTypes: Record<string, number>;
  } {
    const eventTypes: Record<string, number> = {};
    for (const event of this.eventHistory) {
      eventTypes[event.type] = (eventTypes[event.type] || 0) + 1;
    }
    return { totalEvents: this.eventHistory.length, eventTypes };
  }
}

export const EventTypes = {
  SESSION_SIGNED_IN: "session.signedIn",
  SESSION_SIGNED_OUT: "session.signedOut",

  INGOT_SMELTED: "ingot.smelted",

  CRUCIBLE_UPDATED: "crucible.updated",
  CRUCIBLE_LOCKED: "crucible.locked",
  CRUCIBLE_LOCK_FAILED: "crucible.lockFailed",

  RESULTS_CAPTURED: "results.captured",

  POLLER_STARTED: "poller.started",
  POLLER_STOPPED: "poller.stopped",
} as const;
