export * from './authentication-error.js';
export * from './oauth2-errors.js';
