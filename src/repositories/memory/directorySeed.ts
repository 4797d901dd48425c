import { readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { DirectoryEntry } from '@/models';

const PROJECT_ROOT = resolve(__dirname, '../../..');

const directorySeedSchema = z.array(
  z.object({
    ticker: z.string().min(1),
    companyName: z.string().min(1),
    exchange: z.string().min(1),
  })
);

/**
 * Load the equity directory seed file
 * @param seedPath - Absolute, or relative to the project root
 */
export function loadDirectorySeed(seedPath: string): DirectoryEntry[] {
  const raw: unknown = JSON.parse(readFileSync(resolve(PROJECT_ROOT, seedPath), 'utf8'));
  const entries = directorySeedSchema.parse(raw);

  return entries.map((entry) => ({ ...entry, ticker: entry.ticker.toUpperCase() }));
}
