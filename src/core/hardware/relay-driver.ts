import { Logger, LoggerService } from '@nestjs/common';
import { ACTIVE_LEVEL, IDLE_LEVEL, LogicLevel } from '../domain/enums';
import { HardwareInitializationError } from '../domain/errors';
import { ChannelIndex, OutputPin, PinDriver } from '../interfaces';

/**
 * Relay Driver - sole owner of every relay output line.
 *
 * Channel operations never throw: an unknown channel or a failing write is
 * logged and skipped so that one bad line cannot abort a dispense cycle for
 * the other channels of the slot. Only `configure` fails loudly.
 */
export class RelayDriver {
  private readonly pins = new Map<ChannelIndex, OutputPin>();
  private configured = false;

  constructor(
    private readonly pinDriver: PinDriver,
    private readonly bindings: ReadonlyMap<ChannelIndex, number>,
    private readonly logger: LoggerService = new Logger(RelayDriver.name),
  ) {}

  /**
   * Claim every bound line as an output at idle level.
   * Runs once; later calls are no-ops.
   */
  configure(): void {
    if (this.configured) {
      return;
    }

    for (const [channel, line] of this.bindings) {
      try {
        const pin = this.pinDriver.open(line);
        pin.configureAsOutput(IDLE_LEVEL);
        this.pins.set(channel, pin);
      } catch (error) {
        this.releaseAll();
        throw new HardwareInitializationError(
          `Cannot claim GPIO ${line} for channel ${channel} via ${this.pinDriver.name}: ${error instanceof Error ? error.message : String(error)}`,
          line,
          error instanceof Error ? error : undefined,
        );
      }
    }

    this.configured = true;
    this.logger.log(
      `Configured ${this.pins.size} relay channels via ${this.pinDriver.name}, all idle`,
    );
  }

  /**
   * Drive a channel to the active level
   * @returns whether the channel was driven
   */
  engage(channel: ChannelIndex): boolean {
    return this.drive(channel, ACTIVE_LEVEL);
  }

  /**
   * Return a channel to the idle level
   * @returns whether the channel was driven
   */
  disengage(channel: ChannelIndex): boolean {
    return this.drive(channel, IDLE_LEVEL);
  }

  /**
   * Current level of a channel, undefined when the channel is not registered
   */
  levelOf(channel: ChannelIndex): LogicLevel | undefined {
    return this.pins.get(channel)?.read();
  }

  /**
   * Registered channels, ascending
   */
  get channels(): ChannelIndex[] {
    return Array.from(this.pins.keys()).sort((a, b) => a - b);
  }

  get isConfigured(): boolean {
    return this.configured;
  }

  /**
   * Return every line to idle and give it back. Used at shutdown.
   */
  release(): void {
    this.releaseAll();
    this.configured = false;
  }

  private drive(channel: ChannelIndex, level: LogicLevel): boolean {
    const pin = this.pins.get(channel);
    if (!pin) {
      this.logger.warn(`Channel ${channel} is not registered; skipping`);
      return false;
    }

    try {
      if (level === LogicLevel.HIGH) {
        pin.setHigh();
      } else {
        pin.setLow();
      }
      return true;
    } catch (error) {
      this.logger.warn(
        `Channel ${channel} (GPIO ${pin.line}) could not be driven ${level === LogicLevel.HIGH ? 'high' : 'low'}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  private releaseAll(): void {
    for (const [channel, pin] of this.pins) {
      try {
        pin.setHigh();
        pin.release();
      } catch (error) {
        this.logger.warn(
          `Channel ${channel} (GPIO ${pin.line}) release failed: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }
    this.pins.clear();
  }
}
