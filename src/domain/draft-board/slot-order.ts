/**
 * Slot Order Domain Logic
 *
 * Resolves the column (slot) of every pick. Drafts either carry an explicit
 * draft_order per pick, or (older seasons) none at all, in which case the
 * order is inferred from the round 1 pick sequence.
 * No async I/O, no database access.
 */

import { DraftBoardError, DraftOrderFormat, PickRecord, SlottedPick } from './types';

export interface ExplicitOrder {
  format: 'explicit';
  picks: SlottedPick[];
  /** Picks whose draft_order is missing or not a positive integer */
  unplaced: PickRecord[];
}

export interface LegacyOrder {
  format: 'legacy';
  picks: SlottedPick[];
  unplaced: PickRecord[];
  /** teamId -> slot, derived from round 1 */
  teamSlots: Map<string, number>;
}

export type ResolvedSlotOrder = ExplicitOrder | LegacyOrder;

export type SlotOrderResult =
  | { ok: true; order: ResolvedSlotOrder }
  | { ok: false; error: DraftBoardError };

function isValidSlot(value: number | null): value is number {
  return value !== null && Number.isInteger(value) && value >= 1;
}

/**
 * A draft is in the legacy format only when no pick has a draft_order.
 */
export function detectOrderFormat(picks: readonly PickRecord[]): DraftOrderFormat {
  return picks.every((pick) => pick.draftOrder === null) ? 'legacy' : 'explicit';
}

/**
 * Derive teamId -> slot from round 1: picks sorted by pick_in_round get slots
 * 1..n in that order. A team seen twice keeps its first slot.
 */
export function deriveTeamSlots(picks: readonly PickRecord[]): Map<string, number> {
  const firstRound = picks
    .filter((pick) => pick.round === 1)
    .sort((a, b) => a.pickInRound - b.pickInRound);

  const teamSlots = new Map<string, number>();
  for (const pick of firstRound) {
    if (!teamSlots.has(pick.teamId)) {
      teamSlots.set(pick.teamId, teamSlots.size + 1);
    }
  }
  return teamSlots;
}

/**
 * Give every pick a usable slot.
 *
 * Fails with MALFORMED_DRAFT_ORDER when a legacy draft has teams that never
 * picked in round 1, since their column cannot be inferred.
 */
export function resolveSlotOrder(picks: readonly PickRecord[]): SlotOrderResult {
  if (detectOrderFormat(picks) === 'explicit') {
    const placed: SlottedPick[] = [];
    const unplaced: PickRecord[] = [];
    for (const pick of picks) {
      if (isValidSlot(pick.draftOrder)) {
        placed.push({ ...pick, slot: pick.draftOrder });
      } else {
        unplaced.push(pick);
      }
    }
    return { ok: true, order: { format: 'explicit', picks: placed, unplaced } };
  }

  const teamSlots = deriveTeamSlots(picks);

  const missingTeamIds: string[] = [];
  for (const pick of picks) {
    if (!teamSlots.has(pick.teamId) && !missingTeamIds.includes(pick.teamId)) {
      missingTeamIds.push(pick.teamId);
    }
  }

  if (missingTeamIds.length > 0) {
    return {
      ok: false,
      error: {
        code: 'MALFORMED_DRAFT_ORDER',
        message: `Round 1 picks do not cover teams: ${missingTeamIds.join(', ')}`,
        missingTeamIds,
      },
    };
  }

  const placed: SlottedPick[] = [];
  for (const pick of picks) {
    const slot = teamSlots.get(pick.teamId);
    if (slot !== undefined) {
      placed.push({ ...pick, draftOrder: slot, slot });
    }
  }

  return { ok: true, order: { format: 'legacy', picks: placed, unplaced: [], teamSlots } };
}

/**
 * Number of columns: the highest resolved slot.
 */
export function countSlots(picks: readonly SlottedPick[]): number {
  return picks.reduce((max, pick) => Math.max(max, pick.slot), 0);
}

/**
 * Number of rows: the highest round.
 */
export function countRounds(picks: readonly PickRecord[]): number {
  return picks.reduce((max, pick) => Math.max(max, pick.round), 0);
}
