export * from './bytecode.js';
