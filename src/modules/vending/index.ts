export { VendingModule } from './vending.module';
export * from './vending.config';
export * from './constants';
export * from './services';
export * from './controllers';
export { MaintenanceAuthGuard } from './guards';
