import type { Logger } from "@numplace/core";
import { SavedGameRepository } from "../repositories/SavedGameRepository.js";
import { GameSession, SavedGame, SessionOptions } from "../session.js";

/** The single saved game slot. */
export class SavedGameService {
  private present = false;

  constructor(
    private readonly repository: SavedGameRepository,
    private readonly log?: Logger
  ) {}

  /** Whether a saved game exists, as of the last load or write */
  get exists(): boolean {
    return this.present;
  }

  async load(): Promise<SavedGame | null> {
    const saved = await this.repository.load();
    this.present = saved !== null;
    return saved;
  }

  /** Restores the saved game as a Paused session, or null when there is none. */
  async restore(options: SessionOptions = {}): Promise<GameSession | null> {
    const saved = await this.load();
    if (!saved) return null;
    this.log?.debug({ difficulty: saved.difficulty, seed: saved.seed }, "Restoring saved game");
    return GameSession.fromSaved(saved, options);
  }

  async save(session: GameSession, savedAt: Date): Promise<SavedGame> {
    const saved = session.toSaved(savedAt);
    await this.repository.save(saved);
    this.present = true;
    this.log?.debug({ difficulty: saved.difficulty, elapsedMs: saved.elapsedMs }, "Saved game");
    return saved;
  }

  async discard(): Promise<void> {
    await this.repository.remove();
    this.present = false;
  }
}
