import { Condition } from './rules';
import { JsonValue } from './types';

/** Half-open bucket range `[lower, upper)` over the split's bucket space. */
export type Range = [number, number];

export interface Split {
  /** `distribution[i]` lists the bucket ranges that serve variation `i`. */
  distribution: Range[][];
  /** User attribute hashed instead of the user key. */
  bucketBy?: string;
  /** Defaults to the toggle key. */
  salt?: string;
}

export interface Serve {
  select?: number;
  split?: Split;
}

export interface Rule {
  conditions: Condition[];
  serve: Serve;
}

export interface SegmentRule {
  conditions: Condition[];
}

export interface Segment {
  uniqueId: string;
  version: number;
  rules: SegmentRule[];
}

export interface Toggle {
  key: string;
  enabled: boolean;
  version: number;
  forClient?: boolean;
  disabledServe: Serve;
  defaultServe: Serve;
  rules: Rule[];
  variations: JsonValue[];
}

export interface Repository {
  toggles: Record<string, Toggle>;
  segments: Record<string, Segment>;
}
