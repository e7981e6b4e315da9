export * from './chunkNormalizer';
export * from './errors';
export * from './events';
export * from './logger';
export * from './modelAdapters';
export * from './partialJson';
export * from './process';
export * from './rawChunk';
export * from './thinkingSplitter';
export * from './toolCallAccumulator';
