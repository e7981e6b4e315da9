export * from './config';
export * from './embeddingInput';
export * from './envConfig';
export * from './errors';
export * from './llmClient';
export * from './llmHandler';
export * from './logger';
export * from './replay';
export * from './requestParams';
export * from './terminalOutput';
