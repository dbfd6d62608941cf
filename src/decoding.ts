import { logger, loggerPrefix } from './application-logger';
import { Repository, Segment, Toggle } from './interfaces';

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCondition(value: unknown): boolean {
  return (
    isRecord(value) &&
    typeof value.type === 'string' &&
    typeof value.predicate === 'string' &&
    Array.isArray(value.objects)
  );
}

function hasConditions(value: unknown): boolean {
  return isRecord(value) && Array.isArray(value.conditions) && value.conditions.every(isCondition);
}

function isServe(value: unknown): boolean {
  if (!isRecord(value)) {
    return false;
  }
  const { split } = value;
  return (
    split === undefined ||
    (isRecord(split) &&
      Array.isArray(split.distribution) &&
      split.distribution.every(
        (ranges) =>
          Array.isArray(ranges) &&
          ranges.every((range) => Array.isArray(range) && range.length === 2),
      ))
  );
}

function isRule(value: unknown): boolean {
  return hasConditions(value) && isRecord(value) && isServe(value.serve);
}

export function isToggle(value: unknown): value is Toggle {
  return (
    isRecord(value) &&
    typeof value.key === 'string' &&
    typeof value.enabled === 'boolean' &&
    Array.isArray(value.variations) &&
    isServe(value.defaultServe) &&
    isServe(value.disabledServe) &&
    (value.rules === undefined || (Array.isArray(value.rules) && value.rules.every(isRule)))
  );
}

export function isSegment(value: unknown): value is Segment {
  return isRecord(value) && Array.isArray(value.rules) && value.rules.every(hasConditions);
}

function decodeEntries<T>(
  entries: unknown,
  isEntry: (value: unknown) => value is T,
  kind: string,
): Record<string, T> {
  const decoded: Record<string, T> = {};
  if (!isRecord(entries)) {
    return decoded;
  }
  Object.entries(entries).forEach(([key, entry]) => {
    if (isEntry(entry)) {
      decoded[key] = entry;
    } else {
      logger.warn(`${loggerPrefix} Skipping malformed ${kind} in snapshot: ${key}`);
    }
  });
  return decoded;
}

/**
 * Turns a parsed snapshot response into a repository. Toggles and segments whose shape is not
 * recognised are left out; `null` is returned when the response carries no toggles at all.
 */
export function decodeRepository(response: unknown): Repository | null {
  if (!isRecord(response) || !isRecord(response.toggles)) {
    return null;
  }
  return {
    toggles: decodeEntries(response.toggles, isToggle, 'toggle'),
    segments: decodeEntries(response.segments, isSegment, 'segment'),
  };
}
