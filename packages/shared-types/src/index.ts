export * from './domain/conversation.js';
export * from './errors/index.js';
