import { BinaryValue, Gpio } from 'onoff';
import { LogicLevel } from '../../../core/domain/enums';
import { OutputPin, PinDriver } from '../../../core/interfaces';

function toBinary(level: LogicLevel): BinaryValue {
  return level === LogicLevel.HIGH ? 1 : 0;
}

/**
 * Output line backed by the Linux GPIO sysfs interface
 */
class OnoffOutputPin implements OutputPin {
  private gpio?: Gpio;

  constructor(readonly line: number) {}

  configureAsOutput(initial: LogicLevel): void {
    // 'high' / 'low' set direction and level in one step
    this.gpio = new Gpio(this.line, initial === LogicLevel.HIGH ? 'high' : 'low');
  }

  setHigh(): void {
    this.claimed().writeSync(toBinary(LogicLevel.HIGH));
  }

  setLow(): void {
    this.claimed().writeSync(toBinary(LogicLevel.LOW));
  }

  read(): LogicLevel {
    return this.claimed().readSync() === 1 ? LogicLevel.HIGH : LogicLevel.LOW;
  }

  release(): void {
    this.gpio?.unexport();
    this.gpio = undefined;
  }

  private claimed(): Gpio {
    if (!this.gpio) {
      throw new Error(`GPIO ${this.line} is not configured as an output`);
    }
    return this.gpio;
  }
}

/**
 * Pin driver for real hardware via the `onoff` package
 */
export class OnoffPinDriver implements PinDriver {
  readonly name = 'onoff';

  open(line: number): OutputPin {
    if (!Gpio.accessible) {
      throw new Error('GPIO is not accessible on this host');
    }
    return new OnoffOutputPin(line);
  }
}
