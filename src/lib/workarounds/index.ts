export * from './types';
export * from './list-accounts';
export * from './list-rooms';
export * from './deactivate-account';
