import { HOUR_MS } from '../time/constants.js';
import type { TimelineWindow } from '../time/window.js';
import type { TimeZone } from '../zone/timeZone.js';

/**
 * Direction of a UTC offset change.
 *
 * - `fallBack`: the offset one hour later is greater
 * - `springForward`: the offset one hour later is smaller
 */
export type DstTransition = 'springForward' | 'fallBack';

/**
 * A transition observed at an hourly sample.
 */
export interface DstTransitionEvent {
  /** Sample instant whose following hour contains the offset change */
  readonly instant: Date;
  readonly transition: DstTransition;
}

/**
 * Compares the zone's offset at an instant with its offset one hour later.
 *
 * @returns The transition between the two samples, or undefined if the offset
 *          is unchanged
 */
export function detectDstTransition(
  zone: TimeZone,
  instant: Date,
): DstTransition | undefined {
  const offsetBefore = zone.utcOffsetSeconds(instant);
  const offsetAfter = zone.utcOffsetSeconds(new Date(instant.getTime() + HOUR_MS));

  if (offsetAfter > offsetBefore) {
    return 'fallBack';
  }
  if (offsetAfter < offsetBefore) {
    return 'springForward';
  }
  return undefined;
}

/**
 * Samples a window hour by hour from its start and collects every transition.
 * Each event's instant lies in [window.start, window.end).
 *
 * Changes that are not aligned to the sampled hours are reported at the
 * sample preceding them.
 */
export function getDstTransitionsInRange(
  zone: TimeZone,
  window: TimelineWindow,
): DstTransitionEvent[] {
  const transitions: DstTransitionEvent[] = [];
  const endMs = window.end.getTime();

  for (let currentMs = window.start.getTime(); currentMs < endMs; currentMs += HOUR_MS) {
    const instant = new Date(currentMs);
    const transition = detectDstTransition(zone, instant);
    if (transition !== undefined) {
      transitions.push({ instant, transition });
    }
  }

  return transitions;
}
