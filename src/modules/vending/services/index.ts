export { VendingService } from './vending.service';
export type { ReadinessReport } from './vending.service';
export { ConfigurationService } from './configuration.service';
export { VendingLifecycleService } from './vending-lifecycle.service';
