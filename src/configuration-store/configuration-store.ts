import { Repository } from '../interfaces';

/**
 * Holds the repository snapshot shared between the synchronizer (single writer) and
 * evaluation callers (many readers).
 *
 * A snapshot is never mutated once published: `setRepository` replaces the reference, so a
 * reader that took a snapshot keeps seeing a complete, consistent set of toggles and segments
 * even while a newer one is being published.
 */
export interface IToggleStore {
  getRepository(): Repository | null;
  getKeys(): string[];
  isInitialized(): boolean;
  setRepository(repository: Repository): void;
  clear(): void;
}
