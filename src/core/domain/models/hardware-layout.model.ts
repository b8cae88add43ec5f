import { ConfigurationError } from '../errors';
import { ChannelIndex, SlotIdentifier } from '../../interfaces/common.types';

/**
 * Hardware layout - the channel table and the slot table of one enclosure.
 * Loaded once at startup, never mutated.
 */
export interface HardwareLayout {
  /**
   * Logical channel -> BCM GPIO line
   */
  channels: ReadonlyMap<ChannelIndex, number>;

  /**
   * Slot label -> channels driven together to release it, in drive order
   */
  slots: ReadonlyMap<SlotIdentifier, readonly ChannelIndex[]>;
}

/**
 * Build a layout from its JSON form:
 * `{ "channels": { "1": 2, ... }, "slots": { "A1": [3, 12, 13, 14], ... } }`
 */
export function parseHardwareLayout(
  raw: unknown,
  source = 'hardware layout',
): HardwareLayout {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`${source} must be a JSON object`, source);
  }
  if (!isRecord(raw.channels)) {
    throw new ConfigurationError(`${source}: "channels" must be an object`, source);
  }
  if (!isRecord(raw.slots)) {
    throw new ConfigurationError(`${source}: "slots" must be an object`, source);
  }

  const channels = new Map<ChannelIndex, number>();
  for (const [key, line] of Object.entries(raw.channels)) {
    const channel = Number(key);
    if (!Number.isInteger(channel) || channel < 1) {
      throw new ConfigurationError(
        `${source}: channel key "${key}" is not a positive integer`,
        source,
      );
    }
    if (typeof line !== 'number' || !Number.isInteger(line) || line < 0) {
      throw new ConfigurationError(
        `${source}: channel ${channel} must map to a GPIO line number`,
        source,
        { channel, line },
      );
    }
    channels.set(channel, line);
  }

  const slots = new Map<SlotIdentifier, readonly ChannelIndex[]>();
  for (const [slotId, list] of Object.entries(raw.slots)) {
    if (!Array.isArray(list) || list.length === 0) {
      throw new ConfigurationError(
        `${source}: slot ${slotId} must list at least one channel`,
        source,
      );
    }
    const slotChannels: ChannelIndex[] = [];
    for (const entry of list) {
      if (typeof entry !== 'number' || !Number.isInteger(entry)) {
        throw new ConfigurationError(
          `${source}: slot ${slotId} has a non-integer channel`,
          source,
          { slotId, entry },
        );
      }
      slotChannels.push(entry);
    }
    slots.set(slotId, Object.freeze(slotChannels));
  }

  return { channels, slots };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
