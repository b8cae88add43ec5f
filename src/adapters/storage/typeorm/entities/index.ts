export { ProcessedOrderEntity } from './processed-order.entity';
