import { count } from 'drizzle-orm';
import { getDatabase } from '../db/index.js';
import { frameProjects, outputs } from '../db/schema.js';
import { getBulkRunQueueCounts, type QueueCounts } from '../queues/bulk-run.queue.js';
import { OutputStatus, ProjectStatus } from '../types/project.types.js';

export interface ServiceMetrics {
  projects: {
    total: number;
    byStatus: Record<ProjectStatus, number>;
  };
  outputs: {
    total: number;
    byStatus: Record<OutputStatus, number>;
  };
  queue: QueueCounts;
}

function sum(counts: Record<string, number>): number {
  return Object.values(counts).reduce((total, value) => total + value, 0);
}

/**
 * Metrics Service
 * Service-wide counts for the metrics endpoint
 */
export class MetricsService {
  constructor(private readonly queueCounts: () => Promise<QueueCounts> = getBulkRunQueueCounts) {}

  async projectCounts(): Promise<Record<ProjectStatus, number>> {
    const rows = await getDatabase()
      .select({ status: frameProjects.status, value: count() })
      .from(frameProjects)
      .groupBy(frameProjects.status);

    const byStatus: Record<ProjectStatus, number> = {
      [ProjectStatus.DRAFT]: 0,
      [ProjectStatus.COORDINATES_SET]: 0,
      [ProjectStatus.PROCESSING]: 0,
      [ProjectStatus.COMPLETED]: 0,
      [ProjectStatus.FAILED]: 0,
    };
    for (const row of rows) {
      byStatus[row.status] = row.value;
    }
    return byStatus;
  }

  async outputCounts(): Promise<Record<OutputStatus, number>> {
    const rows = await getDatabase()
      .select({ status: outputs.status, value: count() })
      .from(outputs)
      .groupBy(outputs.status);

    const byStatus: Record<OutputStatus, number> = {
      [OutputStatus.SUCCEEDED]: 0,
      [OutputStatus.FAILED]: 0,
    };
    for (const row of rows) {
      byStatus[row.status] = row.value;
    }
    return byStatus;
  }

  async collect(): Promise<ServiceMetrics> {
    const [projectStatus, outputStatus, queue] = await Promise.all([
      this.projectCounts(),
      this.outputCounts(),
      this.queueCounts(),
    ]);

    return {
      projects: { total: sum(projectStatus), byStatus: projectStatus },
      outputs: { total: sum(outputStatus), byStatus: outputStatus },
      queue,
    };
  }
}

export const metricsService = new MetricsService();
