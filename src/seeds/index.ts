import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { loadConfig } from '../config.js';
import { openDatabase, type DatabaseHandle } from '../db.js';
import { SqliteRepository } from '../repository/sqlite.js';
import { tierSchema } from '../schemas.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const TEMPLATES_PATH = path.resolve(__dirname, '..', '..', 'data', 'templates.json');

const templateFileSchema = z.array(
  z.object({
    id: z.string().min(1),
    category: z.string().min(1),
    tier: tierSchema,
    promptFragment: z.string().min(1),
    tags: z.array(z.string()).default([]),
  })
);

/**
 * Loads the template catalog from JSON into the templates table.
 * Re-running replaces entries with the same id.
 */
export function seedTemplates(db: DatabaseHandle, filePath: string = TEMPLATES_PATH): number {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  const templates = templateFileSchema.parse(raw);
  const count = new SqliteRepository(db).insertTemplates(templates);
  console.log(`✓ Seeded ${count} templates`);
  return count;
}

const runSeeders = () => {
  console.log('🌱 Starting database seeding...\n');

  try {
    dotenv.config();
    const db = openDatabase(loadConfig().dbPath);
    seedTemplates(db);
    db.close();

    console.log('\n✅ All seeders completed successfully!');
    process.exit(0);
  } catch (error) {
    console.error('\n❌ Error running seeders:', error);
    process.exit(1);
  }
};

// Run seeders if this file is executed directly
if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  runSeeders();
}

export { runSeeders };
