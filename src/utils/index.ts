export { Logger, ComponentLogger, parseLogLevel, type LogEmitter } from './logger.js';
export { RateLimiter, MinIntervalPolicy, delay, type RateLimitPolicy, type RateLimitState } from './rate-limiter.js';
export { HttpClient, type HttpResponse, type HttpClientOptions } from './http-client.js';
export * from './classify.js';
export * from './merge-results.js';
