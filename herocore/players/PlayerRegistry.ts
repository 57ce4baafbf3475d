// herocore/players/PlayerRegistry.ts

import { PreconditionError } from "../entities/errors";
import type { Player } from "./Player";

/** Connected players, keyed by the per-connection userId events refer to. */
export class PlayerRegistry {
  private readonly players = new Map<number, Player>();

  get size(): number {
    return this.players.size;
  }

  add(player: Player): void {
    if (this.players.has(player.userId)) {
      throw new PreconditionError(`Player with userid ${player.userId} is already connected.`);
    }
    this.players.set(player.userId, player);
  }

  get(userId: number): Player | undefined {
    return this.players.get(userId);
  }

  remove(userId: number): Player | undefined {
    const player = this.players.get(userId);
    if (player) this.players.delete(userId);
    return player;
  }

  values(): Player[] {
    return [...this.players.values()];
  }
}
