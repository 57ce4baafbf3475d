// herocore/test/contract_progressionNotifier.test.ts
//
// Contract: listeners run in registration order; a throwing listener is
// logged and reported but the others still run.

import test from "node:test";
import assert from "node:assert/strict";

import { defineHero, Hero } from "../entities/Hero";
import {
  type HeroLevelChange,
  type ProgressionEvent,
  ProgressionEvents,
  ProgressionNotifier,
} from "../progression/ProgressionNotifier";
import { attachProgressionLogging } from "../progression/progressionLog";
import { makePlayer, withCapturedLogs } from "./testUtils";

const Scout = defineHero({ classId: "Scout" });

function levelChange(notifier: ProgressionNotifier): HeroLevelChange {
  const player = makePlayer({}, notifier);
  return { hero: new Hero(player, Scout), player, levels: 1 };
}

test("[contract] listeners run in registration order", () => {
  const notifier = new ProgressionNotifier();
  const order: string[] = [];
  notifier.on(ProgressionEvents.HeroLevelUp, () => order.push("first"));
  notifier.on(ProgressionEvents.HeroLevelUp, () => order.push("second"));
  notifier.on(ProgressionEvents.HeroLevelDown, () => order.push("other event"));

  notifier.notify(ProgressionEvents.HeroLevelUp, levelChange(notifier));

  assert.deepEqual(order, ["first", "second"]);
});

test("[contract] a throwing listener is logged and reported; the rest still run", async () => {
  const reported: Array<{ event: ProgressionEvent; err: unknown }> = [];
  const notifier = new ProgressionNotifier((event, err) => reported.push({ event, err }));
  const failure = new Error("listener broke");
  const order: string[] = [];

  notifier.on(ProgressionEvents.HeroLevelUp, () => {
    order.push("thrower");
    throw failure;
  });
  notifier.on(ProgressionEvents.HeroLevelUp, () => order.push("survivor"));

  const records = await withCapturedLogs((records) => {
    notifier.notify(ProgressionEvents.HeroLevelUp, levelChange(notifier));
    return records;
  });

  assert.deepEqual(order, ["thrower", "survivor"]);
  assert.equal(reported.length, 1);
  assert.equal(reported[0].event, "hero.levelUp");
  assert.equal(reported[0].err, failure);

  const errors = records.filter((r) => r.level === "error");
  assert.equal(errors.length, 1);
  assert.equal(errors[0].scope, "PROGRESSION");
  assert.equal(errors[0].message, "Listener error on hero.levelUp");
});

test("[contract] a throwing error reporter is logged and does not stop the broadcast", async () => {
  const notifier = new ProgressionNotifier(() => {
    throw new Error("reporter broke");
  });
  const order: string[] = [];
  notifier.on(ProgressionEvents.HeroLevelUp, () => {
    order.push("thrower");
    throw new Error("listener broke");
  });
  notifier.on(ProgressionEvents.HeroLevelUp, () => order.push("survivor"));

  const hero = new Hero(makePlayer({}, notifier), Scout);
  const records = await withCapturedLogs((records) => {
    hero.giveXp(80);
    return records;
  });

  assert.deepEqual(order, ["thrower", "survivor"]);
  assert.equal(hero.level, 1);
  assert.equal(hero.xp, 0);
  assert.deepEqual(
    records.filter((r) => r.level === "error").map((r) => r.message),
    ["Listener error on hero.levelUp", "Listener error reporter failed on hero.levelUp"],
  );
});

test("[contract] unsubscribe removes only that listener", () => {
  const notifier = new ProgressionNotifier();
  const calls: string[] = [];
  const offA = notifier.on(ProgressionEvents.HeroLevelUp, () => calls.push("a"));
  notifier.on(ProgressionEvents.HeroLevelUp, () => calls.push("b"));
  assert.equal(notifier.listenerCount(ProgressionEvents.HeroLevelUp), 2);

  offA();
  offA();
  assert.equal(notifier.listenerCount(ProgressionEvents.HeroLevelUp), 1);

  notifier.notify(ProgressionEvents.HeroLevelUp, levelChange(notifier));
  assert.deepEqual(calls, ["b"]);
});

test("[contract] unsubscribing during a broadcast does not skip the next listener", () => {
  const notifier = new ProgressionNotifier();
  const calls: string[] = [];
  const offSelf = notifier.on(ProgressionEvents.HeroLevelDown, () => {
    calls.push("once");
    offSelf();
  });
  notifier.on(ProgressionEvents.HeroLevelDown, () => calls.push("always"));

  notifier.notify(ProgressionEvents.HeroLevelDown, levelChange(notifier));
  notifier.notify(ProgressionEvents.HeroLevelDown, levelChange(notifier));

  assert.deepEqual(calls, ["once", "always", "always"]);
});

test("[contract] clear drops every listener", () => {
  const notifier = new ProgressionNotifier();
  notifier.on(ProgressionEvents.SkillUpgrade, () => {});
  notifier.on(ProgressionEvents.HeroLevelUp, () => {});

  notifier.clear();

  assert.equal(notifier.listenerCount(ProgressionEvents.SkillUpgrade), 0);
  assert.equal(notifier.listenerCount(ProgressionEvents.HeroLevelUp), 0);
});

test("[contract] progression logging reports level changes under HERO", async () => {
  const notifier = new ProgressionNotifier();
  const detach = attachProgressionLogging(notifier);
  assert.equal(notifier.listenerCount(ProgressionEvents.HeroLevelUp), 1);

  const hero = new Hero(makePlayer({ uniqueId: "player-log" }, notifier), Scout);
  const records = await withCapturedLogs((records) => {
    hero.giveXp(80);
    return records;
  });

  assert.equal(records.length, 1);
  assert.equal(records[0].scope, "HERO");
  assert.equal(records[0].message, "Scout reached level 1");
  assert.deepEqual(records[0].data, [{ playerId: "player-log", levels: 1, skillPoints: 1 }]);

  detach();
  assert.equal(notifier.listenerCount(ProgressionEvents.HeroLevelUp), 0);
  assert.equal(notifier.listenerCount(ProgressionEvents.SkillDowngrade), 0);
});
