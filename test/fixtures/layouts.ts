import { ActuatorMap, HardwareLayout, parseHardwareLayout } from '../../src';

/**
 * A three-channel enclosure: A1 and A2 share channel 2
 */
export function smallLayout(): HardwareLayout {
  return parseHardwareLayout({
    channels: { '1': 5, '2': 6, '3': 7 },
    slots: { A1: [1, 2], A2: [2, 3] },
  });
}

export function smallActuatorMap(): ActuatorMap {
  return ActuatorMap.fromLayout(smallLayout());
}
