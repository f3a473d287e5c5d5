/**
 * Column Header Domain Logic
 *
 * Builds "Slot N" header labels with the team's season rank and points.
 * No async I/O, no database access.
 */

import { ColumnHeader, SlottedPick } from './types';

/** Zero, null and NaN all mean "no value" for rank and points. */
function presentNumber(value: number | null): number | null {
  if (value === null || Number.isNaN(value) || value === 0) return null;
  return value;
}

/**
 * Round to an integer, ties to the even neighbour (1842.5 -> 1842, 1843.5 -> 1844).
 */
export function roundHalfEven(value: number): number {
  const rounded = Math.round(value);
  if (Math.abs(value % 1) === 0.5 && rounded % 2 !== 0) {
    return rounded - 1;
  }
  return rounded;
}

/**
 * Second header line, e.g. "#3 · 1843pts". Empty when neither value is present.
 */
export function formatStandingLine(rank: number | null, points: number | null): string {
  const parts: string[] = [];
  if (rank !== null) parts.push(`#${Math.trunc(rank)}`);
  if (points !== null) parts.push(`${roundHalfEven(points)}pts`);
  return parts.join(' · ');
}

/**
 * One header per slot 1..numSlots. Rank and points come from the first pick
 * placed in that column; every pick in a column belongs to the same team.
 */
export function buildColumnHeaders(
  picks: readonly SlottedPick[],
  numSlots: number
): ColumnHeader[] {
  const firstBySlot = new Map<number, SlottedPick>();
  for (const pick of picks) {
    if (!firstBySlot.has(pick.slot)) {
      firstBySlot.set(pick.slot, pick);
    }
  }

  const headers: ColumnHeader[] = [];
  for (let slot = 1; slot <= numSlots; slot++) {
    const pick = firstBySlot.get(slot);
    const rank = pick ? presentNumber(pick.leagueRank) : null;
    const points = pick ? presentNumber(pick.leaguePoints) : null;
    const standing = formatStandingLine(rank, points);

    headers.push({
      slot,
      label: standing ? `Slot ${slot}\n${standing}` : `Slot ${slot}`,
      rank: rank === null ? null : Math.trunc(rank),
    });
  }
  return headers;
}
