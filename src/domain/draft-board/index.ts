export {
  type PickRecord,
  type SlottedPick,
  type ColumnHeader,
  type GridCollision,
  type DraftOrderFormat,
  type DraftBoardError,
} from './types';

export {
  formatPickCell,
  normalizePick,
  toDisplayString,
  BLANK_NAME_PLACEHOLDER,
  type NormalizedPick,
} from './pick-normalizer';

export {
  detectOrderFormat,
  deriveTeamSlots,
  resolveSlotOrder,
  countSlots,
  countRounds,
  type ExplicitOrder,
  type LegacyOrder,
  type ResolvedSlotOrder,
  type SlotOrderResult,
} from './slot-order';

export { buildPickGrids, createGrid, getCell, type Grid, type PickGrids } from './grid-pivot';

export { buildColumnHeaders, formatStandingLine, roundHalfEven } from './column-headers';

export {
  rankColor,
  NEUTRAL_HEADER_BACKGROUND,
  HEADER_FOREGROUND,
  type RankColor,
} from './rank-color';

export { buildDraftBoard, type DraftBoard, type DraftBoardResult } from './board';
