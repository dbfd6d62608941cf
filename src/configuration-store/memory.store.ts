import { Repository, Segment, Toggle } from '../interfaces';

import { IToggleStore } from './configuration-store';

const NO_TOGGLES: Record<string, Toggle> = {};
const NO_SEGMENTS: Record<string, Segment> = {};

export const EMPTY_REPOSITORY: Repository = Object.freeze({
  toggles: Object.freeze(NO_TOGGLES),
  segments: Object.freeze(NO_SEGMENTS),
});

export class MemoryToggleStore implements IToggleStore {
  private repository: Repository | null = null;
  private initialized = false;

  constructor(repository?: Repository) {
    if (repository) {
      this.setRepository(repository);
    }
  }

  getRepository(): Repository | null {
    return this.repository;
  }

  getKeys(): string[] {
    return Object.keys(this.repository?.toggles ?? {});
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  setRepository(repository: Repository): void {
    this.repository = freezeRepository(repository);
    this.initialized = true;
  }

  clear(): void {
    this.repository = EMPTY_REPOSITORY;
  }
}

function freezeRepository(repository: Repository): Repository {
  return Object.freeze({
    toggles: Object.freeze({ ...(repository.toggles ?? {}) }),
    segments: Object.freeze({ ...(repository.segments ?? {}) }),
  });
}
