export { db, queryClient, type Database } from './client'
export * from './schema/index'
export { PgReadingStore } from './reading-store'
