export * from './ErrorContext';
export * from './RpcError';
export * from './errors';
export * from './errorFactory';
