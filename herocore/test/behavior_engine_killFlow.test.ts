// herocore/test/behavior_engine_killFlow.test.ts
//
// Behavior: the wired engine turns raw game events into skill effects and
// kill XP, saves on disconnect, and saves everyone on shutdown.

import test from "node:test";
import assert from "node:assert/strict";

import { createProgressionEngine } from "../../game-backend/server";
import { InMemoryProgressionStore } from "../db/InMemoryProgressionStore";
import type { Hero } from "../entities/Hero";
import type { Player } from "../players/Player";
import { type HeroLevelChange, ProgressionEvents } from "../progression/ProgressionNotifier";
import { flushAsync, makeActor, withCapturedLogs } from "./testUtils";

function activeHero(player: Player): Hero {
  const hero = player.hero;
  assert.ok(hero, "player has no active hero");
  return hero;
}

function upgrade(hero: Hero, skillId: string): void {
  const skill = hero.skills.get(skillId);
  assert.ok(skill, `missing skill ${skillId}`);
  hero.upgradeSkill(skill);
}

test("[behavior] spawn, kill, hurt and disconnect flow through the engine", async () => {
  await withCapturedLogs(async () => {
    const store = new InMemoryProgressionStore();
    const engine = createProgressionEngine({
      store,
      saveIntervalMs: 60_000,
      activeTeams: [2, 3],
    });
    const levelUps: HeroLevelChange[] = [];
    engine.notifier.on(ProgressionEvents.HeroLevelUp, (c) => levelUps.push(c));

    try {
      const alice = await engine.sessions.connect(
        makeActor({ userId: 11, uniqueId: "player-alice", team: 2 }),
      );
      const bob = await engine.sessions.connect(
        makeActor({ userId: 12, uniqueId: "player-bob", team: 3 }),
      );
      const aliceHero = activeHero(alice);

      // Bonus Health: +5 health per level on spawn
      aliceHero.giveXp(80);
      upgrade(aliceHero, "Bonus_Health");
      engine.feed.emit("player_spawn", { userid: 11 });
      assert.equal(alice.actor.health, 105);

      // headshot kill is worth 45
      engine.feed.emit("player_death", { userid: 12, attacker: 11, headshot: true });
      assert.equal(aliceHero.level, 1);
      assert.equal(aliceHero.xp, 45);

      // Holy Strike: 3 extra damage per level, then a 10s cooldown
      aliceHero.giveXp(50);
      assert.equal(aliceHero.level, 2);
      upgrade(aliceHero, "Holy_Strike");
      engine.feed.emit("player_hurt", { userid: 12, attacker: 11, dmg_health: 20 });
      assert.equal(bob.actor.health, 97);
      engine.feed.emit("player_hurt", { userid: 12, attacker: 11, dmg_health: 20 });
      assert.equal(bob.actor.health, 97);

      assert.deepEqual(
        levelUps.map((c) => [c.player.id, c.levels]),
        [
          ["player-alice", 1],
          ["player-alice", 1],
        ],
      );

      engine.feed.emit("player_disconnect", { userid: 12 });
      await flushAsync();
      assert.equal(engine.players.size, 1);
      assert.equal(await store.getActiveHeroId("player-bob"), "Paladin");
    } finally {
      await engine.shutdown();
    }

    assert.equal(engine.scheduler.running, false);
    assert.equal(engine.feed.handlerCount("player_death"), 0);
    assert.deepEqual(await store.getHeroesData("player-alice"), [
      { heroId: "Paladin", level: 2, xp: 0 },
    ]);
    assert.deepEqual(await store.getSkillsData("player-alice", "Paladin"), [
      { skillId: "Bonus_Health", level: 1 },
      { skillId: "Holy_Strike", level: 1 },
    ]);
  });
});

test("[behavior] spectators get no single-subject skill effects", async () => {
  await withCapturedLogs(async () => {
    const engine = createProgressionEngine({
      store: new InMemoryProgressionStore(),
      saveIntervalMs: 60_000,
      activeTeams: [2, 3],
    });

    try {
      const watcher = await engine.sessions.connect(makeActor({ userId: 21, team: 1 }));
      const hero = activeHero(watcher);
      hero.giveXp(80);
      upgrade(hero, "Bonus_Health");

      engine.feed.emit("player_spawn", { userid: 21 });
      assert.equal(watcher.actor.health, 100);
    } finally {
      await engine.shutdown();
    }
  });
});
