export * from './intake-fate.enum';
export * from './vending-event-type.enum';
export * from './unresolved-reason.enum';
export * from './logic-level.enum';
export * from './dispense-status.enum';
