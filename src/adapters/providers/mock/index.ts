export * from './mock-provider.adapter';
