export const name = '@plugver/shared';

export * from './errors';
export * from './logger';
export * from './config/schema';
