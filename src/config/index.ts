export * from './envs.js';
export * from './verification-config.js';
