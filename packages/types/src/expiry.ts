/**
 * Deadline arithmetic shared by both authorization paths.
 *
 * Units are the caller's: the approval automaton works in unix seconds,
 * the coordinator in epoch milliseconds. A deadline is inclusive, so the
 * instant equal to it is still in time.
 */

export function expiryOf(createdAt: number, period: number): number {
  return createdAt + period;
}

export function isPastDeadline(deadline: number, now: number): boolean {
  return now > deadline;
}
