// herocore/dispatch/GameEventFeed.ts
// ------------------------------------------------------------
// In-process feed of raw game events. The host game pushes every
// event it receives (player_spawn, player_hurt, ...) with its
// key/value argument bag; the dispatcher, XP rewards and the
// session service subscribe by event name.
//
// Handlers run synchronously in subscription order. A throwing
// handler is logged and does not stop the others.
// ------------------------------------------------------------

import { Logger } from "../utils/logger";

const log = Logger.scope("FEED");

export type GameEventArgs = Readonly<Record<string, unknown>>;

export interface GameEvent {
  name: string;
  args: GameEventArgs;
}

export type GameEventHandler = (event: GameEvent) => void;

export class GameEventFeed {
  private handlers: Map<string, GameEventHandler[]> = new Map();

  on(name: string, handler: GameEventHandler): () => void {
    let list = this.handlers.get(name);
    if (!list) {
      list = [];
      this.handlers.set(name, list);
    }
    list.push(handler);
    log.debug(`Handler registered for event: ${name}`);
    return () => this.off(name, handler);
  }

  off(name: string, handler: GameEventHandler): void {
    const list = this.handlers.get(name);
    if (!list) return;
    const idx = list.indexOf(handler);
    if (idx !== -1) list.splice(idx, 1);
  }

  handlerCount(name: string): number {
    return this.handlers.get(name)?.length ?? 0;
  }

  emit(name: string, args: GameEventArgs = {}): void {
    const list = this.handlers.get(name);
    if (!list || list.length === 0) return;

    const event: GameEvent = { name, args };
    for (const handler of [...list]) {
      try {
        handler(event);
      } catch (err) {
        log.error(`Handler error on event ${name}`, err);
      }
    }
  }

  clear(): void {
    this.handlers.clear();
  }
}

/**
 * Read a participant id out of event args. Game events carry ids as numbers
 * (or numeric strings); 0 and missing values mean "nobody", e.g. world damage.
 */
export function userIdArg(args: GameEventArgs, key: string): number | null {
  const raw = args[key];
  const id = typeof raw === "string" && raw.trim() !== "" ? Number(raw) : raw;
  if (typeof id !== "number" || !Number.isInteger(id) || id <= 0) return null;
  return id;
}

export function omitArgs(
  args: GameEventArgs,
  keys: readonly string[],
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(args)) {
    if (!keys.includes(k)) out[k] = v;
  }
  return out;
}
