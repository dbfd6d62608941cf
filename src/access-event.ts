import { JsonValue } from './types';

/**
 * Records a single evaluation call.
 * @public
 */
export interface AccessEvent {
  /**
   * Milliseconds since the epoch at which the value was served
   */
  time: number;

  /**
   * The toggle key the caller asked for
   */
  key: string;

  /**
   * The served value; the caller's default when no variation was served
   */
  value: JsonValue;

  /**
   * Index of the served variation, `null` when the default was served
   */
  index: number | null;

  /**
   * Version of the toggle definition that was evaluated
   */
  version: number | null;

  reason: string;
}

export interface ToggleCounter {
  value: JsonValue;
  version: number | null;
  index: number | null;
  count: number;
}

export interface Access {
  startTime: number;
  endTime: number;
  counters: Record<string, ToggleCounter[]>;
}

/**
 * The document delivered to the events endpoint on every flush.
 */
export interface PackedData {
  events: AccessEvent[];
  access: Access;
}

/**
 * Groups events by (toggle key, variation index, version). Each counter keeps the value of the
 * first event in its group. The access window spans the earliest to the latest event time.
 */
export function buildAccess(events: AccessEvent[]): Access {
  const counters: Record<string, ToggleCounter[]> = {};
  const countersByVariation = new Map<string, ToggleCounter>();
  let startTime = Number.POSITIVE_INFINITY;
  let endTime = Number.NEGATIVE_INFINITY;

  for (const event of events) {
    startTime = Math.min(startTime, event.time);
    endTime = Math.max(endTime, event.time);

    const variationKey = JSON.stringify([event.key, event.index, event.version]);
    const counter = countersByVariation.get(variationKey);
    if (counter) {
      counter.count += 1;
      continue;
    }
    const newCounter: ToggleCounter = {
      value: event.value,
      version: event.version,
      index: event.index,
      count: 1,
    };
    countersByVariation.set(variationKey, newCounter);
    let toggleCounters = counters[event.key];
    if (!toggleCounters) {
      toggleCounters = [];
      counters[event.key] = toggleCounters;
    }
    toggleCounters.push(newCounter);
  }

  return {
    startTime: events.length ? startTime : 0,
    endTime: events.length ? endTime : 0,
    counters,
  };
}

export function buildPackedData(events: AccessEvent[]): PackedData {
  return {
    events,
    access: buildAccess(events),
  };
}
