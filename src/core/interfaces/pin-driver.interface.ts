import { LogicLevel } from '../domain/enums';

/**
 * A single GPIO output line
 */
export interface OutputPin {
  /**
   * BCM line number
   */
  readonly line: number;

  /**
   * Claim the line as an output, driven to `initial` immediately
   */
  configureAsOutput(initial: LogicLevel): void;

  setHigh(): void;

  setLow(): void;

  read(): LogicLevel;

  /**
   * Give the line back to the OS
   */
  release(): void;
}

/**
 * Source of output pins - real GPIO or a simulation
 */
export interface PinDriver {
  readonly name: string;

  /**
   * Open a line. Throws when the line cannot be claimed.
   */
  open(line: number): OutputPin;
}
