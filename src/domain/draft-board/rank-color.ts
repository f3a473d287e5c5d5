/**
 * Rank Color Domain Logic
 *
 * Maps a team's season rank onto a green (best) -> yellow -> red (worst)
 * hue scale for column headers.
 * No async I/O, no database access.
 */

export const NEUTRAL_HEADER_BACKGROUND = '#6c757d';
export const HEADER_FOREGROUND = '#fff';

const GREEN_HUE = 120;
const SATURATION = 75;
const LIGHTNESS = 38;

export type RankColor =
  | { kind: 'neutral'; background: string; foreground: string }
  | {
      kind: 'scale';
      hue: number;
      saturation: number;
      lightness: number;
      background: string;
      foreground: string;
    };

/**
 * @param rank - Season rank, 1 = best; null when the team has no result
 * @param totalSlots - Number of board columns, used to normalize the scale
 */
export function rankColor(rank: number | null, totalSlots: number): RankColor {
  if (rank === null) {
    return {
      kind: 'neutral',
      background: NEUTRAL_HEADER_BACKGROUND,
      foreground: HEADER_FOREGROUND,
    };
  }

  const t = (rank - 1) / Math.max(totalSlots - 1, 1);
  const hue = GREEN_HUE * (1 - t);

  return {
    kind: 'scale',
    hue,
    saturation: SATURATION,
    lightness: LIGHTNESS,
    background: `hsl(${Math.round(hue)}, ${SATURATION}%, ${LIGHTNESS}%)`,
    foreground: HEADER_FOREGROUND,
  };
}
