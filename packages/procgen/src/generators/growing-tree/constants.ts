/**
 * Growing-tree maze constants.
 */

// =============================================================================
// SEED PLACEMENT
// =============================================================================

/** Distance from the grid border to the first seed center */
export const SEED_MARGIN = 2;

/** Cells reserved by the border margins when sizing the seed sub-grid */
export const SEED_BORDER_RESERVE = 4;

/** Minimum Chebyshev distance between two explicit seed centers */
export const MIN_SEED_DISTANCE = 4;

/**
 * Offsets of the plus-shaped seed cluster, in frontier order:
 * the horizontal bar west to east, then north, then south.
 */
export const SEED_CLUSTER_OFFSETS = [
  { x: -1, y: 0 },
  { x: 0, y: 0 },
  { x: 1, y: 0 },
  { x: 0, y: -1 },
  { x: 0, y: 1 },
] as const;

// =============================================================================
// GROWTH
// =============================================================================

/** Cells looked ahead by the join probe */
export const PROBE_DISTANCE = 2;
