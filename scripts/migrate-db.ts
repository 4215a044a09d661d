import sql from 'mssql';
import fs from 'fs/promises';
import path from 'path';
import { config } from '../src/config';
import logger from '../src/lib/utils/logger';
import { errorMessage } from '../src/lib/utils/errors';

/**
 * Split a T-SQL script into batches on GO separator lines
 */
export function splitBatches(script: string): string[] {
  return script
    .split(/^\s*GO\s*$/gim)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

async function migrate(): Promise<void> {
  try {
    logger.info('Starting database migration');

    const dbConfig: sql.config = {
      server: config.database.host,
      port: config.database.port,
      database: config.database.database,
      user: config.database.username,
      password: config.database.password,
      options: {
        encrypt: config.database.encrypt,
        trustServerCertificate: !config.database.encrypt,
      },
    };

    const pool = await sql.connect(dbConfig);
    logger.info('Connected to database');

    const migrationsDir = path.join(__dirname, '../migrations');
    const files = (await fs.readdir(migrationsDir)).filter((file) => file.endsWith('.sql')).sort();

    for (const file of files) {
      const migrationSQL = await fs.readFile(path.join(migrationsDir, file), 'utf-8');
      const statements = splitBatches(migrationSQL);

      logger.info(`Executing ${statements.length} statements from ${file}`);

      for (const [index, statement] of statements.entries()) {
        try {
          await pool.request().query(statement);
          logger.debug(`Executed statement ${index + 1}/${statements.length}`, { file });
        } catch (error) {
          logger.error(`Failed to execute statement ${index + 1}`, { file, error: errorMessage(error) });
          throw error;
        }
      }
    }

    await pool.close();
    logger.info('Database migration completed successfully');
  } catch (error) {
    logger.error('Database migration failed', { error: errorMessage(error) });
    process.exit(1);
  }
}

if (require.main === module) {
  void migrate();
}
