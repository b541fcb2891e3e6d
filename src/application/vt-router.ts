// src/application/vt-router.ts

import { NoHandlerError } from '../errors.js';
import type { VirtualTerminalHandler, VirtualTerminalMessage } from '../types/fieldbus-types.js';

export type RouteResult = { ok: true } | { ok: false; error: Error };

function routeKey(screenId: number, commandId?: number): string {
  return commandId === undefined ? `${screenId}` : `${screenId}:${commandId}`;
}

/**
 * Operator interface routing table keyed by screen id and optional command id.
 * A handler for (screen, command) wins over a screen-wide handler.
 */
export class VirtualTerminalRouter {
  private readonly routes = new Map<string, VirtualTerminalHandler>();

  /**
   * Registers a handler, replacing any previous one for the same key.
   * @returns function removing this registration
   */
  public register(screenId: number, handler: VirtualTerminalHandler, commandId?: number): () => void {
    const key = routeKey(screenId, commandId);
    this.routes.set(key, handler);
    return () => {
      if (this.routes.get(key) === handler) this.routes.delete(key);
    };
  }

  public has(screenId: number, commandId?: number): boolean {
    return this.routes.has(routeKey(screenId, commandId));
  }

  public route(message: VirtualTerminalMessage): RouteResult {
    const handler =
      this.routes.get(routeKey(message.screenId, message.commandId)) ??
      this.routes.get(routeKey(message.screenId));
    if (!handler) {
      return { ok: false, error: new NoHandlerError(message.screenId, message.commandId) };
    }
    try {
      handler(message);
      return { ok: true };
    } catch (err: unknown) {
      return { ok: false, error: err instanceof Error ? err : new Error(String(err)) };
    }
  }
}
