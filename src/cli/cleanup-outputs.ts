#!/usr/bin/env node
/**
 * Deletes blobs of projects that no longer exist
 *
 * Usage:
 *   npx tsx src/cli/cleanup-outputs.ts [--dry-run]
 */

// Load environment variables from .env file
import 'dotenv/config';

import { initDatabase, closeDatabase } from '../db/index.js';
import { orphanCleanupService } from '../services/orphan-cleanup.service.js';

const args = process.argv.slice(2);
const dryRun = args.includes('--dry-run');

async function main(): Promise<void> {
  await initDatabase();

  try {
    const result = await orphanCleanupService.run(dryRun);

    console.log(`\nScanned ${result.scanned} project prefixes.`);
    for (const prefix of result.recent) {
      console.log(`  skipped (recent)  ${prefix}`);
    }
    if (result.orphaned.length === 0) {
      console.log('No orphaned blobs found.\n');
      return;
    }

    for (const prefix of result.orphaned) {
      console.log(`  ${dryRun ? 'would delete' : 'deleted'}  ${prefix}`);
    }
    if (dryRun) {
      console.log(`\n${result.orphaned.length} orphaned prefixes (dry run, nothing deleted).\n`);
    } else {
      console.log(`\n✓ Deleted ${result.deletedObjects} objects under ${result.orphaned.length} prefixes.\n`);
    }
  } finally {
    await closeDatabase();
  }
}

main().catch((error: unknown) => {
  console.error(`\nError: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
