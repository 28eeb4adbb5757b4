/**
 * Database Migration Runner
 * Calls runMigrations() from store/database.ts. Safe to run multiple times,
 * all statements use IF NOT EXISTS and are fully idempotent.
 *
 * Usage: npm run build && npm run migrate
 */
import 'dotenv/config'
import { initDatabase, runMigrations, closeDatabase } from './store/database.js'

const dbUrl = process.env.DATABASE_URL
if (!dbUrl) {
    console.error('❌  DATABASE_URL not set in .env')
    process.exit(1)
}

console.log('🗄️  Connecting to database...')
initDatabase(dbUrl)

try {
    await runMigrations()
    console.log('✅  All migrations applied successfully')
} catch (err) {
    console.error('❌  Migration failed:', err instanceof Error ? err.message : err)
    process.exitCode = 1
} finally {
    await closeDatabase()
}
