import type { KeyValueStore, Logger } from "@numplace/core";
import { SavedGame, isSavedGame } from "../session.js";

export const SAVED_GAME_KEY = "saved-game";

export class SavedGameRepository {
  constructor(
    private readonly store: KeyValueStore,
    private readonly log?: Logger
  ) {}

  async load(): Promise<SavedGame | null> {
    const raw = await this.store.read(SAVED_GAME_KEY);
    if (raw === undefined) return null;
    if (!isSavedGame(raw)) {
      this.log?.warn({ key: SAVED_GAME_KEY }, "Ignoring malformed saved game");
      return null;
    }
    return raw;
  }

  async save(game: SavedGame): Promise<void> {
    await this.store.write(SAVED_GAME_KEY, game);
  }

  async remove(): Promise<void> {
    await this.store.remove(SAVED_GAME_KEY);
  }
}
