export * from './relay-driver';
export * from './dispense-controller';
export * from './hardware-layout.loader';
