export { MaintenanceAuthGuard } from './maintenance-auth.guard';
