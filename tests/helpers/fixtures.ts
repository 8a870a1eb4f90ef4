/**
 * Parameter sets shared by the unit tests.
 */

export const OFFLINE_CORE_VALUES = {
  weight_width: 8,
  LCN: 1,
  input_width: 1,
  spike_width: 1,
  neuron_num: 100,
  pool_max: 0,
  tick_wait_start: 1,
  tick_wait_end: 100,
  SNN_EN: 1,
  target_LCN: 1,
  test_chip_addr: 0,
} as const;

/** Packed form of OFFLINE_CORE_VALUES */
export const OFFLINE_CORE_HEX = '0x3000c800020192000000000';

export const OFFLINE_NEURON_VALUES = {
  reset_mode: 'normal',
  reset_v: -5,
  leak_post: 'leak_after_comp',
  threshold_mask_ctrl: 0,
  threshold_neg_mode: 'reset',
  threshold_neg: 10,
  threshold_pos: 20,
  leak_reversal_flag: 'forward',
  leak_det_stoch: 'deterministic',
  leak_v: -1,
  weight_det_stoch: 'deterministic',
  bit_truncate: 8,
  addr_chip_x: 0,
  addr_chip_y: 0,
  addr_core_x: 3,
  addr_core_y: 4,
  addr_core_x_ex: 0,
  addr_core_y_ex: 0,
  tick_relative: 0,
  addr_axon: 12,
} as const;

export const ONLINE_CORE_VALUES = {
  weight_width: 1,
  LCN: 1,
  upper_weight: 10,
  lower_weight: -10,
  neuron_start: 0,
  neuron_end: 99,
  test_chip_addr: { x: 1, y: 2 },
} as const;

export const ONLINE_NEURON_1BIT_VALUES = {
  leak_v: -3,
  threshold: 100,
  floor_threshold: -20,
  reset_v: 0,
  init_v: 1,
  plasticity_start: 0,
  plasticity_end: 127,
  addr_axon: 5,
  tick_relative: 1,
  addr_core_x: 28,
  addr_core_y: 29,
  addr_core_x_ex: 0,
  addr_core_y_ex: 0,
} as const;

export const ONLINE_NEURON_VALUES = {
  ...ONLINE_NEURON_1BIT_VALUES,
  threshold: 100000,
  addr_chip_x: 0,
  addr_chip_y: 0,
} as const;
