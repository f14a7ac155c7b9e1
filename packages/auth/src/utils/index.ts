export * from './pkce.js';
export * from './auth-url.js';
export * from './callback.js';
export * from './result.js';
export * from './error/parse-error-response.js';
export * from './token/parse-token-response.js';
export * from './request/token-request.js';
