/**
 * Builder exports
 */

export * from './builders/playBuilder';
export * from './builders/connectionBuilder';
