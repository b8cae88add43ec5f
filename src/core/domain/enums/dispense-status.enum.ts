/**
 * Terminal state of a single dispense cycle
 */
export enum DispenseStatus {
  /**
   * Every channel engaged, held and released
   */
  COMPLETED = 'completed',

  /**
   * Cycle ran but at least one channel could not be driven
   */
  DEGRADED = 'degraded',

  /**
   * Slot unknown to the actuator map; nothing was driven
   */
  UNKNOWN_SLOT = 'unknown_slot',
}
