import {
  valid as validSemver,
  eq as semverEq,
  gt as semverGt,
  lt as semverLt,
  gte as semverGte,
  lte as semverLte,
} from 'semver';

import { Segment } from './interfaces';
import { ToggleUser } from './user';

export enum ConditionType {
  STRING = 'string',
  SEGMENT = 'segment',
  DATETIME = 'datetime',
  NUMBER = 'number',
  SEMVER = 'semver',
}

export enum StringPredicate {
  IS_ONE_OF = 'is one of',
  ENDS_WITH = 'ends with',
  STARTS_WITH = 'starts with',
  CONTAINS = 'contains',
  MATCHES_REGEX = 'matches regex',
  IS_NOT_ANY_OF = 'is not any of',
  DOES_NOT_END_WITH = 'does not end with',
  DOES_NOT_START_WITH = 'does not start with',
  DOES_NOT_CONTAIN = 'does not contain',
  DOES_NOT_MATCH_REGEX = 'does not match regex',
}

export enum SegmentPredicate {
  IS_IN = 'is in',
  IS_NOT_IN = 'is not in',
}

export enum DatetimePredicate {
  AFTER = 'after',
  BEFORE = 'before',
}

export enum OrderingPredicate {
  EQ = '=',
  NEQ = '!=',
  GT = '>',
  GTE = '>=',
  LT = '<',
  LTE = '<=',
}

type StringCondition = {
  type: ConditionType.STRING;
  subject: string;
  predicate: StringPredicate;
  objects: string[];
};

type SegmentCondition = {
  type: ConditionType.SEGMENT;
  subject: string;
  predicate: SegmentPredicate;
  objects: string[];
};

type DatetimeCondition = {
  type: ConditionType.DATETIME;
  subject: string;
  predicate: DatetimePredicate;
  objects: string[];
};

type NumberCondition = {
  type: ConditionType.NUMBER;
  subject: string;
  predicate: OrderingPredicate;
  objects: string[];
};

type SemVerCondition = {
  type: ConditionType.SEMVER;
  subject: string;
  predicate: OrderingPredicate;
  objects: string[];
};

export type Condition =
  | StringCondition
  | SegmentCondition
  | DatetimeCondition
  | NumberCondition
  | SemVerCondition;

/**
 * Evaluates a list of conditions with AND semantics, stopping at the first one that fails.
 *
 * `visiting` holds the keys of the segments currently being expanded, so a segment that
 * (directly or transitively) references itself is treated as not containing the user.
 */
export function matchesConditions(
  conditions: Condition[],
  user: ToggleUser,
  segments: Record<string, Segment>,
  visiting: ReadonlySet<string> = new Set(),
): boolean {
  return (
    Array.isArray(conditions) &&
    conditions.every(
      (condition) => isRecord(condition) && matchesCondition(condition, user, segments, visiting),
    )
  );
}

export function matchesCondition(
  condition: Condition,
  user: ToggleUser,
  segments: Record<string, Segment>,
  visiting: ReadonlySet<string> = new Set(),
): boolean {
  // a condition without a list of objects matches nothing, negated predicates included
  if (!hasStringObjects(condition)) {
    return false;
  }

  switch (condition.type) {
    case ConditionType.SEGMENT:
      return evaluateSegmentCondition(condition, user, segments, visiting);
    case ConditionType.DATETIME:
      return evaluateDatetimeCondition(condition, user.get(condition.subject));
  }

  const value = user.get(condition.subject);
  if (value === undefined) {
    return false;
  }

  switch (condition.type) {
    case ConditionType.STRING:
      return evaluateStringCondition(condition, value);
    case ConditionType.NUMBER:
      return evaluateNumberCondition(condition, value);
    case ConditionType.SEMVER:
      return evaluateSemVerCondition(condition, value);
    default:
      return false;
  }
}

export function segmentContains(
  segmentKey: string,
  user: ToggleUser,
  segments: Record<string, Segment>,
  visiting: ReadonlySet<string> = new Set(),
): boolean {
  const segment = segments[segmentKey];
  if (!segment || visiting.has(segmentKey)) {
    return false;
  }
  const nested = new Set(visiting).add(segmentKey);
  const rules = Array.isArray(segment.rules) ? segment.rules : [];
  return rules.some(
    (rule) => isRecord(rule) && matchesConditions(rule.conditions, user, segments, nested),
  );
}

function evaluateSegmentCondition(
  condition: SegmentCondition,
  user: ToggleUser,
  segments: Record<string, Segment>,
  visiting: ReadonlySet<string>,
): boolean {
  const inAny = condition.objects.some((segmentKey) =>
    segmentContains(segmentKey, user, segments, visiting),
  );
  switch (condition.predicate) {
    case SegmentPredicate.IS_IN:
      return inAny;
    case SegmentPredicate.IS_NOT_IN:
      return !inAny;
    default:
      return false;
  }
}

function evaluateStringCondition(condition: StringCondition, value: string): boolean {
  const { objects } = condition;
  switch (condition.predicate) {
    case StringPredicate.IS_ONE_OF:
      return objects.includes(value);
    case StringPredicate.ENDS_WITH:
      return objects.some((object) => value.endsWith(object));
    case StringPredicate.STARTS_WITH:
      return objects.some((object) => value.startsWith(object));
    case StringPredicate.CONTAINS:
      return objects.some((object) => value.includes(object));
    case StringPredicate.MATCHES_REGEX:
      return objects.some((object) => matchesRegex(object, value));
    case StringPredicate.IS_NOT_ANY_OF:
      return !objects.includes(value);
    case StringPredicate.DOES_NOT_END_WITH:
      return !objects.some((object) => value.endsWith(object));
    case StringPredicate.DOES_NOT_START_WITH:
      return !objects.some((object) => value.startsWith(object));
    case StringPredicate.DOES_NOT_CONTAIN:
      return !objects.some((object) => value.includes(object));
    case StringPredicate.DOES_NOT_MATCH_REGEX:
      return !objects.some((object) => matchesRegex(object, value));
    default:
      return false;
  }
}

function evaluateNumberCondition(condition: NumberCondition, value: string): boolean {
  const attributeValue = parseNumber(value);
  if (attributeValue === null) {
    return false;
  }
  const conditionValues = condition.objects
    .map(parseNumber)
    .filter((object): object is number => object !== null);
  return compareOrdered(condition.predicate, attributeValue, conditionValues, {
    eq: (a, b) => a === b,
    gt: (a, b) => a > b,
    gte: (a, b) => a >= b,
    lt: (a, b) => a < b,
    lte: (a, b) => a <= b,
  });
}

function evaluateSemVerCondition(condition: SemVerCondition, value: string): boolean {
  if (!validSemver(value)) {
    return false;
  }
  const conditionValues = condition.objects.filter((object) => !!validSemver(object));
  return compareOrdered(condition.predicate, value, conditionValues, {
    eq: semverEq,
    gt: semverGt,
    gte: semverGte,
    lt: semverLt,
    lte: semverLte,
  });
}

function evaluateDatetimeCondition(condition: DatetimeCondition, value?: string): boolean {
  // a user without the attribute is evaluated at the current time
  const attributeValue = value === undefined ? Math.floor(Date.now() / 1000) : parseNumber(value);
  if (attributeValue === null) {
    return false;
  }
  const conditionValues = condition.objects
    .map(parseNumber)
    .filter((object): object is number => object !== null);
  switch (condition.predicate) {
    case DatetimePredicate.AFTER:
      return conditionValues.some((object) => attributeValue >= object);
    case DatetimePredicate.BEFORE:
      return conditionValues.some((object) => attributeValue < object);
    default:
      return false;
  }
}

interface Comparators<T> {
  eq: (a: T, b: T) => boolean;
  gt: (a: T, b: T) => boolean;
  gte: (a: T, b: T) => boolean;
  lt: (a: T, b: T) => boolean;
  lte: (a: T, b: T) => boolean;
}

function compareOrdered<T>(
  predicate: OrderingPredicate,
  attributeValue: T,
  conditionValues: T[],
  compare: Comparators<T>,
): boolean {
  switch (predicate) {
    case OrderingPredicate.EQ:
      return conditionValues.some((object) => compare.eq(attributeValue, object));
    case OrderingPredicate.NEQ:
      return !conditionValues.some((object) => compare.eq(attributeValue, object));
    case OrderingPredicate.GT:
      return conditionValues.some((object) => compare.gt(attributeValue, object));
    case OrderingPredicate.GTE:
      return conditionValues.some((object) => compare.gte(attributeValue, object));
    case OrderingPredicate.LT:
      return conditionValues.some((object) => compare.lt(attributeValue, object));
    case OrderingPredicate.LTE:
      return conditionValues.some((object) => compare.lte(attributeValue, object));
    default:
      return false;
  }
}

function hasStringObjects(condition: Condition): boolean {
  return (
    Array.isArray(condition.objects) &&
    condition.objects.every((object) => typeof object === 'string')
  );
}

function isRecord(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

function matchesRegex(pattern: string, value: string): boolean {
  try {
    return new RegExp(pattern).test(value);
  } catch {
    return false;
  }
}

function parseNumber(value: string): number | null {
  if (value.trim() === '') {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}
