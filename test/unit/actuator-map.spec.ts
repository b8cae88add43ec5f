import {
  ActuatorMap,
  ConfigurationError,
  loadHardwareLayout,
  parseHardwareLayout,
} from '../../src';

describe('ActuatorMap', () => {
  describe('parseHardwareLayout', () => {
    it('should read channel bindings and slot channel lists', () => {
      const layout = parseHardwareLayout({
        channels: { '1': 2, '2': 3 },
        slots: { A1: [2, 1] },
      });

      expect(Array.from(layout.channels.entries())).toEqual([
        [1, 2],
        [2, 3],
      ]);
      expect(layout.slots.get('A1')).toEqual([2, 1]);
    });

    it('should reject a non-object document', () => {
      expect(() => parseHardwareLayout([])).toThrow(ConfigurationError);
      expect(() => parseHardwareLayout([], 'layout.json')).toThrow(
        'layout.json must be a JSON object',
      );
    });

    it('should reject a channel key that is not a positive integer', () => {
      expect(() =>
        parseHardwareLayout({ channels: { zero: 2 }, slots: {} }, 'layout'),
      ).toThrow('layout: channel key "zero" is not a positive integer');
    });

    it('should reject a channel bound to something other than a line number', () => {
      expect(() =>
        parseHardwareLayout({ channels: { '1': 'GPIO2' }, slots: {} }, 'layout'),
      ).toThrow('layout: channel 1 must map to a GPIO line number');
    });

    it('should reject a slot without channels', () => {
      expect(() =>
        parseHardwareLayout({ channels: { '1': 2 }, slots: { A1: [] } }, 'layout'),
      ).toThrow('layout: slot A1 must list at least one channel');
    });
  });

  describe('fromLayout', () => {
    it('should reject a slot that references an unbound channel', () => {
      const layout = parseHardwareLayout({
        channels: { '1': 2 },
        slots: { A1: [1, 9] },
      });

      expect(() => ActuatorMap.fromLayout(layout)).toThrow(
        'Slot A1 references unbound channel(s) 9',
      );
    });

    it('should reject a slot that lists a channel twice', () => {
      const layout = parseHardwareLayout({
        channels: { '1': 2, '2': 3 },
        slots: { A1: [1, 2, 1] },
      });

      expect(() => ActuatorMap.fromLayout(layout)).toThrow(
        'Slot A1 lists a channel more than once',
      );
    });

    it('should reject two channels bound to the same line', () => {
      const layout = parseHardwareLayout({
        channels: { '1': 4, '2': 4 },
        slots: { A1: [1] },
      });

      expect(() => ActuatorMap.fromLayout(layout)).toThrow(
        'Channels 1 and 2 are both bound to GPIO 4',
      );
    });

    it('should allow slots to share channels', () => {
      const map = ActuatorMap.fromLayout(
        parseHardwareLayout({
          channels: { '1': 5, '2': 6, '3': 7 },
          slots: { A1: [1, 2], A2: [2, 3] },
        }),
      );

      expect(map.channelsFor('A1')).toEqual([1, 2]);
      expect(map.channelsFor('A2')).toEqual([2, 3]);
      expect(map.channelsFor('Z9')).toBeUndefined();
      expect(map.bindings.get(3)).toBe(7);
      expect(map.channels).toEqual([1, 2, 3]);
      expect(map.toJSON()).toEqual({ A1: [1, 2], A2: [2, 3] });
    });
  });

  describe('bundled hardware layout', () => {
    const map = ActuatorMap.fromLayout(loadHardwareLayout());

    it('should define 32 slots over 16 channels', () => {
      expect(map.slotIds).toHaveLength(32);
      expect(map.channels).toEqual([
        1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15, 16,
      ]);
    });

    it('should drive B3 through channels 2, 7, 12 and 14', () => {
      expect(map.channelsFor('B3')).toEqual([2, 7, 12, 14]);
      expect([2, 7, 12, 14].map((channel) => map.bindings.get(channel))).toEqual([
        3, 10, 13, 26,
      ]);
    });

    it('should fail with a configuration error for a missing file', () => {
      expect(() => loadHardwareLayout('config/does-not-exist.json')).toThrow(
        ConfigurationError,
      );
    });
  });
});
