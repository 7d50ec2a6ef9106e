/**
 * Apply the SQL files in server/sql/ in name order. Every statement is idempotent (IF NOT EXISTS), so re-running is safe.
 * Run: npm run migrate
 */
import '../src/env'
import path from 'path'
import fs from 'fs'
import { closePool, createSqlExecutor } from '../src/db'
import { describeError, getLogger } from '../src/lib/logger'
import { loadWorkerConfig } from '../src/utils/workerConfig'

const log = getLogger('worker')
const SQL_DIR = path.join(__dirname, '..', 'sql')

async function main(): Promise<void> {
  const files = fs
    .readdirSync(SQL_DIR)
    .filter((f) => f.endsWith('.sql'))
    .sort()
  const db = createSqlExecutor()
  for (const file of files) {
    const sql = fs.readFileSync(path.join(SQL_DIR, file), 'utf8')
    await db.query(sql)
    log.info({ file }, 'Applied migration')
  }
  // the SQL files create the default queue; a custom QUEUE_NAME is created here
  const { queueName } = loadWorkerConfig()
  await db.query(
    `SELECT pgmq.create($1)
     WHERE NOT EXISTS (SELECT 1 FROM pgmq.list_queues() WHERE queue_name = $1)`,
    [queueName]
  )
  log.info({ queueName }, 'Queue ready')
}

main()
  .catch((err: unknown) => {
    log.fatal({ err: describeError(err) }, 'Migration failed')
    process.exitCode = 1
  })
  .finally(() => closePool())
