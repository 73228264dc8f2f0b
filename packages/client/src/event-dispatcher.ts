/**
 * EventDispatcher - fan-out of topic events and status notices
 *
 * Delivers to the listeners registered at emission time; nothing is buffered,
 * so a listener added later never sees earlier events.
 */

import { Logger } from "pushline-kernel";
import type { EventHandler, EventPayload, StatusHandler, StatusNotice } from "./types";

export class EventDispatcher {
  private topicHandlers = new Map<string, Set<EventHandler>>();
  private anyTopicHandlers = new Set<EventHandler>();
  private statusHandlers = new Set<StatusHandler>();
  private log = Logger.for(this);

  /**
   * Listen to topic events: all of them, or only those of one topic.
   * @returns Unsubscribe function
   */
  onEvent(handler: EventHandler): () => void;
  onEvent(topic: string, handler: EventHandler): () => void;
  onEvent(topicOrHandler: string | EventHandler, maybeHandler?: EventHandler): () => void {
    if (typeof topicOrHandler === "function") {
      const handler = topicOrHandler;
      this.anyTopicHandlers.add(handler);
      return () => {
        this.anyTopicHandlers.delete(handler);
      };
    }

    const topic = topicOrHandler;
    if (!maybeHandler) {
      throw new TypeError("onEvent(topic, handler) requires a handler");
    }
    const handler = maybeHandler;

    let handlers = this.topicHandlers.get(topic);
    if (!handlers) {
      handlers = new Set();
      this.topicHandlers.set(topic, handlers);
    }
    handlers.add(handler);

    return () => {
      const current = this.topicHandlers.get(topic);
      current?.delete(handler);
      if (current?.size === 0) {
        this.topicHandlers.delete(topic);
      }
    };
  }

  /**
   * Listen to connection, state and error notices.
   * @returns Unsubscribe function
   */
  onStatus(handler: StatusHandler): () => void {
    this.statusHandlers.add(handler);
    return () => {
      this.statusHandlers.delete(handler);
    };
  }

  emitEvent(event: EventPayload): void {
    const handlers = [...(this.topicHandlers.get(event.topic) ?? []), ...this.anyTopicHandlers];
    for (const handler of handlers) {
      try {
        handler(event);
      } catch (error) {
        this.log.error({ err: error, topic: event.topic }, "Event listener threw");
      }
    }
  }

  emitStatus(notice: StatusNotice): void {
    for (const handler of [...this.statusHandlers]) {
      try {
        handler(notice);
      } catch (error) {
        this.log.error({ err: error, notice: notice.type }, "Status listener threw");
      }
    }
  }

  /** Number of registered listeners, both kinds */
  listenerCount(): number {
    let count = this.anyTopicHandlers.size + this.statusHandlers.size;
    for (const handlers of this.topicHandlers.values()) {
      count += handlers.size;
    }
    return count;
  }

  clear(): void {
    this.topicHandlers.clear();
    this.anyTopicHandlers.clear();
    this.statusHandlers.clear();
  }
}
