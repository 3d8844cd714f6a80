import 'dotenv/config'
import { openDatabase } from '../src/db'
import { SqliteLedger } from '../src/ledger'

async function main() {
  const db = openDatabase(process.env.DB_PATH || 'db.sqlite3')
  const count = await new SqliteLedger(db).countUsers()
  console.log('Users in DB: ', count)
  db.close()
  process.exit(0)
}

main().catch((e) => {
  console.error(e)
  process.exit(1)
})
