export * from './square-provider.adapter';
export * from './square-signature';
