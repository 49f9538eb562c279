/**
 * EventManager
 *
 * Maps each lifecycle event to an ordered list of handlers. Handlers run one
 * after another in registration order; a failing handler is logged and the
 * rest still run.
 */

import { createLogger } from '../../utils/logger.js';
import { errorMessage } from '../errors/index.js';
import type { EventContext } from './context.js';
import type { HookEvent } from './types.js';

export type EventHandler = (event: HookEvent, context: EventContext) => void | Promise<void>;

const logger = createLogger('events');

export class EventManager {
  private handlers: Map<HookEvent, EventHandler[]> = new Map();

  /**
   * Register a handler for an event. Duplicates are allowed.
   */
  on(event: HookEvent, handler: EventHandler): void {
    const handlers = this.handlers.get(event) || [];
    handlers.push(handler);
    this.handlers.set(event, handlers);
  }

  /**
   * Remove the first registration of a handler
   */
  off(event: HookEvent, handler: EventHandler): boolean {
    const handlers = this.handlers.get(event) || [];
    const index = handlers.indexOf(handler);
    if (index === -1) {
      return false;
    }
    handlers.splice(index, 1);
    return true;
  }

  /**
   * Call every handler registered for `event`, in order
   */
  async fire(event: HookEvent, context: EventContext): Promise<void> {
    const handlers = this.handlers.get(event);
    if (!handlers || handlers.length === 0) {
      return;
    }

    // Snapshot so a handler registering another handler does not affect this firing
    for (const handler of [...handlers]) {
      try {
        await handler(event, context);
      } catch (error) {
        logger.warn(`Handler for ${event} failed: ${errorMessage(error)}`);
      }
    }
  }

  handlerCount(event: HookEvent): number {
    return this.handlers.get(event)?.length ?? 0;
  }

  clear(event: HookEvent): void {
    this.handlers.delete(event);
  }

  clearAll(): void {
    this.handlers.clear();
  }
}
