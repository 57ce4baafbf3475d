// herocore/test/contract_heroXpLevels.test.ts
//
// Contract: XP fills quota(level) = 80 + 15 * level. Gains and losses may
// cross several levels in one call and notify once with the total. A hero
// on its max level banks XP against an infinite quota.

import test from "node:test";
import assert from "node:assert/strict";

import { defineHero, Hero, xpQuotaForLevel } from "../entities/Hero";
import { EntityRangeError, PreconditionError } from "../entities/errors";
import {
  type HeroLevelChange,
  ProgressionEvents,
  ProgressionNotifier,
} from "../progression/ProgressionNotifier";
import { makePlayer, withCapturedLogs } from "./testUtils";

const Squire = defineHero({ classId: "Squire", maxLevel: 5 });
const Wanderer = defineHero({ classId: "Wanderer" });

function trackedHero(state: { level?: number; xp?: number } = {}) {
  const notifier = new ProgressionNotifier();
  const ups: HeroLevelChange[] = [];
  const downs: HeroLevelChange[] = [];
  notifier.on(ProgressionEvents.HeroLevelUp, (c) => ups.push(c));
  notifier.on(ProgressionEvents.HeroLevelDown, (c) => downs.push(c));

  const player = makePlayer({}, notifier);
  const hero = new Hero(player, Squire, state);
  return { hero, player, ups, downs };
}

test("[contract] quota grows by 15 per level from 80", () => {
  assert.equal(xpQuotaForLevel(0), 80);
  assert.equal(xpQuotaForLevel(3), 125);

  const { hero } = trackedHero({ level: 3 });
  assert.equal(hero.xpQuota, 125);
});

test("[contract] exactly one quota levels up once", () => {
  const { hero, player, ups } = trackedHero();

  hero.giveXp(80);

  assert.equal(hero.level, 1);
  assert.equal(hero.xp, 0);
  assert.equal(ups.length, 1);
  assert.equal(ups[0].hero, hero);
  assert.equal(ups[0].player, player);
  assert.equal(ups[0].levels, 1);
});

test("[contract] a multi-level gain notifies once with the level count", () => {
  const { hero, ups } = trackedHero();

  // 80 for level 0 -> 1, then 95 for level 1 -> 2
  hero.giveXp(175);

  assert.equal(hero.level, 2);
  assert.equal(hero.xp, 0);
  assert.equal(hero.xpQuota, 110);
  assert.equal(ups.length, 1);
  assert.equal(ups[0].levels, 2);
});

test("[contract] XP below quota accumulates without a notification", () => {
  const { hero, ups } = trackedHero();

  hero.giveXp(79);

  assert.equal(hero.level, 0);
  assert.equal(hero.xp, 79);
  assert.equal(ups.length, 0);
});

test("[contract] max level stops leveling and banks the rest", () => {
  const { hero, ups } = trackedHero();

  // quotas 80 + 95 + 110 + 125 + 140 = 550 reach level 5
  hero.giveXp(1000);

  assert.equal(hero.level, 5);
  assert.equal(hero.xp, 450);
  assert.equal(hero.xpQuota, Infinity);
  assert.equal(ups.length, 1);
  assert.equal(ups[0].levels, 5);

  hero.giveXp(50);
  assert.equal(hero.level, 5);
  assert.equal(hero.xp, 500);
  assert.equal(ups.length, 1);
});

test("[contract] unbounded heroes keep leveling", () => {
  const hero = new Hero(makePlayer(), Wanderer);
  hero.giveXp(1000);
  // 550 reaches level 5, then 155 and 170 more reach level 7
  assert.equal(hero.level, 7);
  assert.equal(hero.xp, 125);
  assert.equal(hero.xpQuota, 185);
});

test("[contract] losing XP below zero de-levels and refills from the entered level's quota", () => {
  const { hero, ups, downs } = trackedHero({ level: 2, xp: 10 });

  hero.takeXp(20);

  assert.equal(hero.level, 1);
  assert.equal(hero.xp, 85);
  assert.equal(ups.length, 0);
  assert.equal(downs.length, 1);
  assert.equal(downs[0].levels, 1);
});

test("[contract] give then take of the same amount restores level and xp", () => {
  const { hero, ups, downs } = trackedHero();

  hero.giveXp(300);
  assert.equal(hero.level, 3);
  assert.equal(hero.xp, 15);

  hero.takeXp(300);
  assert.equal(hero.level, 0);
  assert.equal(hero.xp, 0);

  assert.equal(ups[0].levels, 3);
  assert.equal(downs[0].levels, 3);
});

test("[contract] at level 0 xp may go negative and is not floored", () => {
  const { hero, downs } = trackedHero();

  hero.takeXp(25);
  assert.equal(hero.level, 0);
  assert.equal(hero.xp, -25);
  assert.equal(downs.length, 0);

  hero.giveXp(105);
  assert.equal(hero.level, 1);
  assert.equal(hero.xp, 0);
});

test("[contract] negative or non-finite amounts are rejected without changes", () => {
  const { hero } = trackedHero({ level: 1, xp: 40 });

  assert.throws(() => hero.giveXp(-1), {
    name: "PreconditionError",
    message: "giveXp() received a negative value, use takeXp() instead.",
  });
  assert.throws(() => hero.takeXp(-5), {
    name: "PreconditionError",
    message: "takeXp() received a negative value, use giveXp() instead.",
  });
  assert.throws(() => hero.giveXp(Number.NaN), PreconditionError);
  assert.throws(() => hero.takeXp(Infinity), PreconditionError);

  assert.equal(hero.level, 1);
  assert.equal(hero.xp, 40);
});

test("[contract] fractional xp is rejected everywhere without changes", () => {
  const { hero, ups, downs } = trackedHero({ level: 1, xp: 40 });

  assert.throws(() => hero.giveXp(0.5), {
    name: "PreconditionError",
    message: "giveXp() received a non-integer amount 0.5.",
  });
  assert.throws(() => hero.takeXp(1.5), {
    name: "PreconditionError",
    message: "takeXp() received a non-integer amount 1.5.",
  });
  assert.throws(() => {
    hero.xp = 10.5;
  }, {
    name: "EntityRangeError",
    message: "Attempt to set Squire's xp to 10.5.",
  });

  assert.equal(hero.level, 1);
  assert.equal(hero.xp, 40);
  assert.equal(ups.length, 0);
  assert.equal(downs.length, 0);
});

test("[contract] xp assignment routes through give/take", () => {
  const { hero, ups, downs } = trackedHero();

  hero.xp = 80;
  assert.equal(hero.level, 1);
  assert.equal(hero.xp, 0);

  // same value: nothing happens
  hero.xp = hero.xp;
  assert.equal(hero.level, 1);
  assert.equal(ups.length, 1);

  hero.xp = -10;
  assert.equal(hero.level, 0);
  assert.equal(hero.xp, 70);
  assert.equal(downs.length, 1);

  hero.xp += 30;
  assert.equal(hero.level, 1);
  assert.equal(hero.xp, 20);
  assert.equal(ups.length, 2);

  assert.throws(() => {
    hero.xp = Number.NaN;
  }, EntityRangeError);
  assert.equal(hero.xp, 20);
});

test("[contract] a hero cannot start with non-finite or fractional xp", () => {
  assert.throws(() => new Hero(makePlayer(), Squire, { xp: Infinity }), EntityRangeError);
  assert.throws(() => new Hero(makePlayer(), Squire, { xp: 0.5 }), {
    name: "EntityRangeError",
    message: "Hero Squire cannot start with xp 0.5.",
  });
});

test("[contract] a failing listener does not undo the level change", async () => {
  const reported: unknown[] = [];
  const notifier = new ProgressionNotifier((_event, err) => reported.push(err));
  notifier.on(ProgressionEvents.HeroLevelUp, () => {
    throw new Error("listener failed");
  });

  const hero = new Hero(makePlayer({}, notifier), Squire);

  await withCapturedLogs(() => {
    hero.giveXp(80);
  });

  assert.equal(hero.level, 1);
  assert.equal(hero.xp, 0);
  assert.equal(reported.length, 1);
});
