/**
 * Load env so DATABASE_URL / REDIS_URL are set before db and redis modules are imported.
 * Must be the first import in index.ts and workers/jobProcessor.ts.
 */
import 'dotenv/config'
import path from 'path'
import fs from 'fs'
import dotenv from 'dotenv'

// Project root .env; try cwd then __dirname so it works regardless of how the process is started
const rootEnvCwd = path.join(process.cwd(), '..', '.env')
const rootEnvDir = path.join(__dirname, '..', '..', '.env')
const rootEnv = fs.existsSync(rootEnvCwd) ? rootEnvCwd : fs.existsSync(rootEnvDir) ? rootEnvDir : null
if (rootEnv && !process.env.DATABASE_URL) {
  dotenv.config({ path: rootEnv, override: false })
}

// When running on the host (not in Docker), service hostnames won't resolve; use localhost.
const inDocker = fs.existsSync('/.dockerenv')
if (!inDocker) {
  if (process.env.REDIS_URL === 'redis://redis:6379') {
    process.env.REDIS_URL = 'redis://localhost:6379'
  }
  if (process.env.DATABASE_URL?.includes('@postgres:')) {
    process.env.DATABASE_URL = process.env.DATABASE_URL.replace('@postgres:', '@localhost:')
  }
}
