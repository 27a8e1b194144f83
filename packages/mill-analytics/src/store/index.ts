export {
  InMemoryReadingStore,
  loadCleanReadings,
  type ReadingStore,
  type WritableReadingStore,
} from './reading-store.js';
