export * from './schemas/auth';
export * from './schemas/task';
export type * from './types/auth';
