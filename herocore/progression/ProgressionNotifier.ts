// herocore/progression/ProgressionNotifier.ts
// ------------------------------------------------------------
// Purpose:
// Listener registry for hero/skill progression transitions.
// Heroes publish here; UI, chat feedback and logging subscribe.
//
// Listeners run synchronously in registration order. A throwing
// listener is logged (and handed to onListenerError when set);
// the remaining listeners and the publishing operation carry on.
// ------------------------------------------------------------

import type { Hero } from "../entities/Hero";
import type { Skill } from "../entities/Skill";
import type { Player } from "../players/Player";
import { Logger } from "../utils/logger";

const log = Logger.scope("PROGRESSION");

export const ProgressionEvents = {
  HeroLevelUp: "hero.levelUp",
  HeroLevelDown: "hero.levelDown",
  SkillUpgrade: "skill.upgrade",
  SkillDowngrade: "skill.downgrade",
} as const;

export type ProgressionEvent =
  (typeof ProgressionEvents)[keyof typeof ProgressionEvents];

export interface HeroLevelChange {
  hero: Hero;
  player: Player;
  /** Levels gained or lost by the single operation that fired this. */
  levels: number;
}

export interface SkillLevelChange {
  skill: Skill;
  hero: Hero;
  player: Player;
}

export type ProgressionPayloads = {
  "hero.levelUp": HeroLevelChange;
  "hero.levelDown": HeroLevelChange;
  "skill.upgrade": SkillLevelChange;
  "skill.downgrade": SkillLevelChange;
};

export type ProgressionListener<K extends ProgressionEvent> = (
  payload: ProgressionPayloads[K],
) => void;

export type ListenerErrorReporter = (
  event: ProgressionEvent,
  err: unknown,
) => void;

type ListenerTable = {
  [K in ProgressionEvent]: ProgressionListener<K>[];
};

function emptyTable(): ListenerTable {
  return {
    "hero.levelUp": [],
    "hero.levelDown": [],
    "skill.upgrade": [],
    "skill.downgrade": [],
  };
}

export class ProgressionNotifier {
  private listeners: ListenerTable = emptyTable();

  constructor(private readonly onListenerError?: ListenerErrorReporter) {}

  /** Register a listener; the returned function unregisters it. */
  on<K extends ProgressionEvent>(
    event: K,
    listener: ProgressionListener<K>,
  ): () => void {
    const list: ProgressionListener<K>[] = this.listeners[event];
    list.push(listener);
    return () => this.off(event, listener);
  }

  off<K extends ProgressionEvent>(
    event: K,
    listener: ProgressionListener<K>,
  ): void {
    const list: ProgressionListener<K>[] = this.listeners[event];
    const idx = list.indexOf(listener);
    if (idx !== -1) list.splice(idx, 1);
  }

  listenerCount(event: ProgressionEvent): number {
    return this.listeners[event].length;
  }

  notify<K extends ProgressionEvent>(
    event: K,
    payload: ProgressionPayloads[K],
  ): void {
    const list: ProgressionListener<K>[] = this.listeners[event];
    if (list.length === 0) return;

    // Snapshot: a listener unsubscribing mid-broadcast must not skip its
    // neighbour.
    for (const listener of [...list]) {
      try {
        listener(payload);
      } catch (err) {
        log.error(`Listener error on ${event}`, err);
        this.report(event, err);
      }
    }
  }

  clear(): void {
    this.listeners = emptyTable();
  }

  private report(event: ProgressionEvent, err: unknown): void {
    if (!this.onListenerError) return;
    try {
      this.onListenerError(event, err);
    } catch (reportErr) {
      log.error(`Listener error reporter failed on ${event}`, reportErr);
    }
  }
}

/** Notifier shared by players that are not given their own. */
export const progressionNotifier = new ProgressionNotifier();
