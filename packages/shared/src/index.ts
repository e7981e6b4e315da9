export * from './normalizedEvents';
