import { BUCKET_SIZE } from './constants';
import { Range, Segment, Serve, Split, Toggle } from './interfaces';
import { matchesConditions } from './rules';
import { SHA1Sharder, Sharder } from './sharders';
import { ToggleValue } from './toggle-value';
import { ToggleUser } from './user';

export interface EvaluationDetail {
  /** `null` when no variation could be served; the caller falls back to its default. */
  value: ToggleValue | null;
  variationIndex: number | null;
  ruleIndex: number | null;
  version: number | null;
  reason: string;
}

type ServeResolution = { variationIndex: number } | { error: string };

export class Evaluator {
  sharder: Sharder;

  constructor(sharder?: Sharder) {
    this.sharder = sharder ?? new SHA1Sharder();
  }

  evaluateToggle(
    toggle: Toggle,
    user: ToggleUser,
    segments: Record<string, Segment> = {},
  ): EvaluationDetail {
    if (!toggle.enabled) {
      return this.serveVariation(toggle, toggle.disabledServe, user, null, 'Toggle disabled');
    }

    const rules = Array.isArray(toggle.rules) ? toggle.rules : [];
    for (let i = 0; i < rules.length; i++) {
      const rule = rules[i];
      if (rule && matchesConditions(rule.conditions, user, segments)) {
        return this.serveVariation(toggle, rule.serve, user, i, `Rule ${i} hit`);
      }
    }

    return this.serveVariation(toggle, toggle.defaultServe, user, null, 'Default rule hit');
  }

  resolveServe(serve: Serve | undefined, user: ToggleUser, toggleKey: string): ServeResolution {
    if (typeof serve?.select === 'number') {
      return { variationIndex: serve.select };
    }
    if (serve?.split) {
      return this.resolveSplit(serve.split, user, toggleKey);
    }
    return { error: 'Serve has neither a select nor a split' };
  }

  bucketFor(split: Split, user: ToggleUser, toggleKey: string): number | null {
    let hashKey = user.getKey();
    if (split.bucketBy) {
      const attribute = user.get(split.bucketBy);
      if (attribute === undefined) {
        return null;
      }
      hashKey = attribute;
    }
    const salt = split.salt || toggleKey;
    return this.sharder.getShard(hashKey + salt, BUCKET_SIZE);
  }

  private resolveSplit(split: Split, user: ToggleUser, toggleKey: string): ServeResolution {
    const bucket = this.bucketFor(split, user, toggleKey);
    if (bucket === null) {
      return {
        error: `User with key ${user.getKey()} does not have attribute named: [${split.bucketBy}]`,
      };
    }
    const distribution = Array.isArray(split.distribution) ? split.distribution : [];
    const variationIndex = distribution.findIndex(
      (ranges) => Array.isArray(ranges) && ranges.some((range) => isInBucketRange(bucket, range)),
    );
    if (variationIndex < 0) {
      return { error: `Bucket ${bucket} is not in the split distribution` };
    }
    return { variationIndex };
  }

  private serveVariation(
    toggle: Toggle,
    serve: Serve | undefined,
    user: ToggleUser,
    ruleIndex: number | null,
    reason: string,
  ): EvaluationDetail {
    const version = typeof toggle.version === 'number' ? toggle.version : null;
    const resolution = this.resolveServe(serve, user, toggle.key);
    if ('error' in resolution) {
      return noneResult(ruleIndex, version, resolution.error);
    }

    const { variationIndex } = resolution;
    const variations = Array.isArray(toggle.variations) ? toggle.variations : [];
    if (!isValidVariationIndex(variationIndex, variations.length)) {
      return noneResult(
        ruleIndex,
        version,
        `Variation index ${variationIndex} overflow, toggle has ${variations.length} variations`,
      );
    }

    return {
      value: ToggleValue.of(variations[variationIndex]),
      variationIndex,
      ruleIndex,
      version,
      reason,
    };
  }
}

export function isInBucketRange(bucket: number, range: Range): boolean {
  if (!Array.isArray(range)) {
    return false;
  }
  const [lower, upper] = range;
  return lower <= bucket && bucket < upper;
}

function isValidVariationIndex(index: number, variationCount: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < variationCount;
}

export function noneResult(
  ruleIndex: number | null,
  version: number | null,
  reason: string,
): EvaluationDetail {
  return {
    value: null,
    variationIndex: null,
    ruleIndex,
    version,
    reason,
  };
}
