/**
 * Database Schema
 */

export * from './schema/embeddings.js';
