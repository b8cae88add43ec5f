import { LogicLevel } from '../../../core/domain/enums';
import { OutputPin, PinDriver } from '../../../core/interfaces';

export interface PinLevelChange {
  line: number;
  level: LogicLevel;
  at: number;
}

/**
 * In-memory output line; records every level it is driven to
 */
export class SimulatedOutputPin implements OutputPin {
  private level?: LogicLevel;
  released = false;

  constructor(
    readonly line: number,
    private readonly driver: SimulatedPinDriver,
  ) {}

  configureAsOutput(initial: LogicLevel): void {
    this.write(initial);
  }

  setHigh(): void {
    this.write(LogicLevel.HIGH);
  }

  setLow(): void {
    this.write(LogicLevel.LOW);
  }

  get current(): LogicLevel | undefined {
    return this.level;
  }

  read(): LogicLevel {
    if (this.level === undefined) {
      throw new Error(`GPIO ${this.line} is not configured as an output`);
    }
    return this.level;
  }

  release(): void {
    this.released = true;
  }

  private write(level: LogicLevel): void {
    if (this.released) {
      throw new Error(`GPIO ${this.line} has been released`);
    }
    this.driver.beforeWrite(this.line, level);
    this.level = level;
    this.driver.history.push({ line: this.line, level, at: Date.now() });
  }
}

/**
 * Pin driver for development and tests. Can be told to refuse a line or
 * to fail writes of a given level on a line.
 */
export class SimulatedPinDriver implements PinDriver {
  readonly name = 'simulated';
  readonly history: PinLevelChange[] = [];
  readonly pins: Map<number, SimulatedOutputPin> = new Map();

  private readonly failOnOpen: Set<number> = new Set();
  private readonly failOnWrite: Map<number, LogicLevel | 'any'> = new Map();

  open(line: number): OutputPin {
    if (this.failOnOpen.has(line)) {
      throw new Error(`GPIO ${line} is busy`);
    }
    const pin = new SimulatedOutputPin(line, this);
    this.pins.set(line, pin);
    return pin;
  }

  /**
   * Make `open` throw for a line
   */
  refuseLine(line: number): void {
    this.failOnOpen.add(line);
  }

  /**
   * Make writes to a line throw, for one level or for every level
   */
  failWrites(line: number, level: LogicLevel | 'any' = 'any'): void {
    this.failOnWrite.set(line, level);
  }

  /**
   * Current level of a line, undefined when never driven
   */
  levelOf(line: number): LogicLevel | undefined {
    return this.pins.get(line)?.current;
  }

  /**
   * Lines driven low at any point since `clearHistory`
   */
  engagedLines(): number[] {
    const lines = new Set(
      this.history.filter((c) => c.level === LogicLevel.LOW).map((c) => c.line),
    );
    return Array.from(lines).sort((a, b) => a - b);
  }

  clearHistory(): void {
    this.history.length = 0;
  }

  /** @internal */
  beforeWrite(line: number, level: LogicLevel): void {
    const failing = this.failOnWrite.get(line);
    if (failing === 'any' || failing === level) {
      throw new Error(`GPIO ${line} write failed`);
    }
  }
}
