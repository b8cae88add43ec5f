export * from './simulated-pin.driver';
