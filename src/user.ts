import { randomUUID } from 'crypto';

import { Attributes } from './types';

/**
 * The subject of an evaluation.
 *
 * The key is the identity hashed for percentage rollouts. Call `stableRollout` to pin it so the
 * same user lands in the same bucket across evaluations and processes; otherwise a random key is
 * generated on first use and kept for the lifetime of this object.
 */
export class ToggleUser {
  private key?: string;
  private readonly attrs: Attributes = {};

  constructor(attrs: Attributes = {}) {
    Object.assign(this.attrs, attrs);
  }

  stableRollout(key: string): this {
    this.key = key;
    return this;
  }

  with(name: string, value: string): this {
    this.attrs[name] = value;
    return this;
  }

  getKey(): string {
    if (this.key === undefined) {
      this.key = randomUUID();
    }
    return this.key;
  }

  has(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.attrs, name);
  }

  get(name: string): string | undefined {
    return this.has(name) ? this.attrs[name] : undefined;
  }

  getAttrs(): Readonly<Attributes> {
    return { ...this.attrs };
  }
}
