import { readFileSync } from 'fs';
import { join } from 'path';
import { loadConfig } from './src/config/env';
import { createSupabaseAdmin } from './src/config/supabase';

// Requires an `exec_sql(sql_query text)` helper function on the database
async function runMigration(filename: string) {
  const config = loadConfig({ ...process.env, STORE_PROVIDER: 'supabase' });
  const supabaseAdmin = createSupabaseAdmin(config);

  console.log(`\n🚀 Running migration: ${filename}...`);

  const migrationPath = join(process.cwd(), 'migrations', filename);
  const sql = readFileSync(migrationPath, 'utf-8');

  // Sent whole: the file contains a plpgsql body with inner semicolons
  const { error } = await supabaseAdmin.rpc('exec_sql', { sql_query: sql });
  if (error) {
    throw new Error(`Migration ${filename} failed: ${error.message}`);
  }

  console.log(`\n✅ Migration ${filename} completed successfully!`);
}

runMigration('001_settlement_engine.sql')
  .then(() => {
    console.log('\n✨ All migrations completed!');
    process.exit(0);
  })
  .catch((error: unknown) => {
    console.error('\n❌ Migration failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
