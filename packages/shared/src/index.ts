export * from './envConfig';
export * from './retries/backoff';
export * from './retries/config';
