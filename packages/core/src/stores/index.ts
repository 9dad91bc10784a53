export { InMemoryContactStore, matchesSearch } from './in-memory.js';
