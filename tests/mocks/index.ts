export * from './ollama-client.mock';
export * from './config-store.mock';
export * from './usage-logger.mock';
export * from './system-detector.mock';
