/**
 * Hardware Constants
 *
 * Chip limits referenced by field domains and cross-field checks.
 *
 * @module hw/constants
 */

// =============================================================================
// Core Coordinates
// =============================================================================

export const N_BIT_CORE_X = 5;
export const N_BIT_CORE_Y = 5;
export const CORE_X_MAX = (1 << N_BIT_CORE_X) - 1;
export const CORE_Y_MAX = (1 << N_BIT_CORE_Y) - 1;

/** Cores in the online region start at x = y = 28 */
export const CORE_ONLINE_MIN = 0b11100;

// =============================================================================
// Dendrites and Fan-in
// =============================================================================

export const HW_LIMITS = {
  /** Fan-in of one dendrite with 1-bit input */
  N_FANIN_PER_DENDRITE_MAX: 1152,
  /** Fan-in of one dendrite with 8-bit input */
  N_FANIN_PER_DENDRITE_ANN: 144,
  N_DENDRITE_MAX_SNN: 512,
  N_DENDRITE_MAX_ANN: 4096,
  N_NEURON_MAX_SNN: 512,
  N_NEURON_MAX_ANN: 1888,
  /** Highest destination axon address */
  ADDR_AXON_MAX: 1151,
  N_TIMESLOT_MAX: 256,
} as const;

/** Width of one online neuron RAM word */
export const ONLINE_NEURON_WORD_BITS = 128;
