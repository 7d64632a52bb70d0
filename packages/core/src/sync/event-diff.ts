import type { EventKey, FetchedEvent } from '../types/index.js';

/**
 * Key used to compare events; providers supply no event ids
 */
function eventKey(date: string, description: string): string {
  return JSON.stringify([date, description]);
}

/**
 * Fetched events not yet stored, in fetched order (newest first).
 *
 * An event is new when its (date, description) pair is absent from `stored`.
 * A pair repeated within `fetched` is returned once, at its first position.
 */
export function diffEvents(stored: readonly EventKey[], fetched: readonly FetchedEvent[]): FetchedEvent[] {
  const seen = new Set(stored.map((e) => eventKey(e.eventDate, e.description)));
  const fresh: FetchedEvent[] = [];
  for (const event of fetched) {
    const key = eventKey(event.date, event.description);
    if (seen.has(key)) continue;
    seen.add(key);
    fresh.push(event);
  }
  return fresh;
}
