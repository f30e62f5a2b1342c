export { describePileEvent } from './helpers';
export * from './types';
