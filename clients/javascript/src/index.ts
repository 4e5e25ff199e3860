/**
 * TubeChat TypeScript/JavaScript SDK
 *
 * Client library for the TubeChat video summary and Q&A API
 */

export { TubeChatClient } from './client';

export * from './types';
export * from './errors';
