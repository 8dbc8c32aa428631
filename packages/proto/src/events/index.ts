export * from './auth';
export * from './subscription';
export * from './task';
export * from './board';
export * from './comment';
export * from './presence';
export * from './control';
