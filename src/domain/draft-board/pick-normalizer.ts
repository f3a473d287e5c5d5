/**
 * Pick Normalizer Domain Logic
 *
 * Pure functions for blank-safe pick fields and cell display text.
 * No async I/O, no database access.
 */

import { PickRecord } from './types';

export const BLANK_NAME_PLACEHOLDER = '—';

export interface NormalizedPick {
  round: number;
  overallPick: number;
  firstName: string;
  lastName: string;
  position: string;
  team: string;
  cellText: string;
}

/**
 * Coerce a nullable field to display text. Missing values and NaN become ''.
 */
export function toDisplayString(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number' && Number.isNaN(value)) return '';
  return String(value);
}

/**
 * Format the overall pick number as a plain integer (no separators, no decimals).
 */
export function formatOverallPick(overallPick: number): string {
  if (!Number.isFinite(overallPick)) return '';
  return String(Math.trunc(overallPick));
}

/**
 * Build the two-line cell text for a pick:
 *   "First Last\nPOS · TEAM (overall)"
 *
 * When both name parts are blank the name line is the placeholder dash.
 */
export function formatPickCell(
  pick: Pick<PickRecord, 'firstName' | 'lastName' | 'position' | 'team' | 'overallPick'>
): string {
  const name =
    `${toDisplayString(pick.firstName)} ${toDisplayString(pick.lastName)}`.trim() ||
    BLANK_NAME_PLACEHOLDER;
  const position = toDisplayString(pick.position);
  const team = toDisplayString(pick.team);

  return `${name}\n${position} · ${team} (${formatOverallPick(pick.overallPick)})`;
}

export function normalizePick(pick: PickRecord): NormalizedPick {
  return {
    round: pick.round,
    overallPick: pick.overallPick,
    firstName: toDisplayString(pick.firstName),
    lastName: toDisplayString(pick.lastName),
    position: toDisplayString(pick.position),
    team: toDisplayString(pick.team),
    cellText: formatPickCell(pick),
  };
}
