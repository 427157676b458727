import { DEFAULT_DATABASE_URL } from '../src/config.js';
import { createSql } from '../src/db/pool.js';
import { runMigrations } from '../migrations/runner.js';

const sql = createSql(process.env['DATABASE_URL'] ?? DEFAULT_DATABASE_URL);
await runMigrations(sql);
await sql.end();
