import type { TimeWindow } from "./types";

/**
 * Whether `itemDate` falls inside `window`. Both bounds are inclusive; a null
 * bound imposes no constraint.
 */
export function acceptInWindow(itemDate: Date, window: TimeWindow): boolean {
  const time = itemDate.getTime();
  if (window.from !== null && time < window.from.getTime()) return false;
  if (window.to !== null && time > window.to.getTime()) return false;
  return true;
}
