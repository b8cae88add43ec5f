/**
 * Output line level. Relays on the board are active-low:
 * HIGH is idle (open), LOW energizes the coil.
 */
export enum LogicLevel {
  LOW = 0,
  HIGH = 1,
}

export const IDLE_LEVEL = LogicLevel.HIGH;
export const ACTIVE_LEVEL = LogicLevel.LOW;
