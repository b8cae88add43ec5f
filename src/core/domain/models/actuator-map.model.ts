import { ConfigurationError } from '../errors';
import { HardwareLayout } from './hardware-layout.model';
import { ChannelIndex, SlotIdentifier } from '../../interfaces/common.types';

/**
 * ActuatorMap - which relay channels release which slot.
 *
 * Invariants checked on construction:
 * - every channel a slot references is bound to a GPIO line
 * - a slot lists each channel at most once
 * - no two channels share a GPIO line
 *
 * Channels are legitimately shared between slots (the lift and column motors
 * are common to a whole row), so the same channel appears under many slots.
 */
export class ActuatorMap {
  private constructor(
    private readonly slotChannels: ReadonlyMap<SlotIdentifier, readonly ChannelIndex[]>,
    private readonly channelLines: ReadonlyMap<ChannelIndex, number>,
  ) {}

  static fromLayout(layout: HardwareLayout): ActuatorMap {
    const seenLines = new Map<number, ChannelIndex>();
    for (const [channel, line] of layout.channels) {
      const other = seenLines.get(line);
      if (other !== undefined) {
        throw new ConfigurationError(
          `Channels ${other} and ${channel} are both bound to GPIO ${line}`,
          'actuator-map',
          { line, channels: [other, channel] },
        );
      }
      seenLines.set(line, channel);
    }

    for (const [slotId, channels] of layout.slots) {
      const unique = new Set(channels);
      if (unique.size !== channels.length) {
        throw new ConfigurationError(
          `Slot ${slotId} lists a channel more than once`,
          'actuator-map',
          { slotId, channels: [...channels] },
        );
      }
      const unbound = channels.filter((channel) => !layout.channels.has(channel));
      if (unbound.length > 0) {
        throw new ConfigurationError(
          `Slot ${slotId} references unbound channel(s) ${unbound.join(', ')}`,
          'actuator-map',
          { slotId, unbound },
        );
      }
    }

    return new ActuatorMap(
      new Map(layout.slots),
      new Map(layout.channels),
    );
  }

  /**
   * Channels to drive for a slot, or undefined for an unknown slot
   */
  channelsFor(slotId: SlotIdentifier): readonly ChannelIndex[] | undefined {
    return this.slotChannels.get(slotId);
  }

  /**
   * Channel to GPIO line table, as the relay driver needs it
   */
  get bindings(): ReadonlyMap<ChannelIndex, number> {
    return this.channelLines;
  }

  get slotIds(): SlotIdentifier[] {
    return Array.from(this.slotChannels.keys());
  }

  /**
   * Every bound channel, ascending
   */
  get channels(): ChannelIndex[] {
    return Array.from(this.channelLines.keys()).sort((a, b) => a - b);
  }

  toJSON(): Record<SlotIdentifier, ChannelIndex[]> {
    const result: Record<SlotIdentifier, ChannelIndex[]> = {};
    for (const [slotId, channels] of this.slotChannels) {
      result[slotId] = [...channels];
    }
    return result;
  }
}
