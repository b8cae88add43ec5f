export * from './hardware-layout.model';
export * from './actuator-map.model';
export * from './square-webhook.payload';
