import { createChildLogger } from '../utils/logger.js';
import { PROJECTS_PREFIX, storageService, type StorageService } from './storage.service.js';
import { projectStore, type ProjectStore } from './project-store.service.js';

const logger = createChildLogger({ service: 'orphan-cleanup' });

/** Prefixes written more recently than this may belong to a project still being created */
const DEFAULT_MIN_AGE_MS = 60 * 60 * 1000;

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export interface OrphanCleanupResult {
  scanned: number;
  orphaned: string[];
  /** Orphaned prefixes left alone because they were written within the grace period */
  recent: string[];
  deletedObjects: number;
  dryRun: boolean;
}

/**
 * Project id of a `projects/<id>/` prefix, or null for anything else
 */
export function projectIdFromPrefix(prefix: string): string | null {
  if (!prefix.startsWith(PROJECTS_PREFIX)) {
    return null;
  }
  const id = prefix.slice(PROJECTS_PREFIX.length).replace(/\/$/, '');
  return UUID_PATTERN.test(id) ? id : null;
}

/**
 * Removes blob prefixes left behind by projects that no longer exist
 */
export class OrphanCleanupService {
  constructor(
    private readonly blobs: Pick<StorageService, 'listPrefixes' | 'lastModified' | 'deletePrefix'> = storageService,
    private readonly projects: Pick<ProjectStore, 'existingIds'> = projectStore,
    private readonly options: { minAgeMs: number; now: () => Date } = {
      minAgeMs: DEFAULT_MIN_AGE_MS,
      now: () => new Date(),
    }
  ) {}

  async run(dryRun: boolean): Promise<OrphanCleanupResult> {
    const prefixes = await this.blobs.listPrefixes(PROJECTS_PREFIX);

    const candidates = new Map<string, string>();
    for (const prefix of prefixes) {
      const id = projectIdFromPrefix(prefix);
      if (id) {
        candidates.set(id, prefix);
      }
    }

    const existing = await this.projects.existingIds([...candidates.keys()]);
    const unowned = [...candidates].filter(([id]) => !existing.has(id)).map(([, prefix]) => prefix);

    const cutoff = this.options.now().getTime() - this.options.minAgeMs;
    const orphaned: string[] = [];
    const recent: string[] = [];
    for (const prefix of unowned) {
      const modified = await this.blobs.lastModified(prefix);
      if (modified && modified.getTime() > cutoff) {
        recent.push(prefix);
      } else {
        orphaned.push(prefix);
      }
    }

    let deletedObjects = 0;
    if (!dryRun) {
      for (const prefix of orphaned) {
        const removed = await this.blobs.deletePrefix(prefix);
        deletedObjects += removed;
        logger.info({ prefix, objects: removed }, 'Deleted orphaned project blobs');
      }
    }

    return { scanned: prefixes.length, orphaned, recent, deletedObjects, dryRun };
  }
}

export const orphanCleanupService = new OrphanCleanupService();
