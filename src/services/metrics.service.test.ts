import { describe, it, expect, vi, beforeEach } from 'vitest';

// Mock chain for database queries
const createChainMock = () => {
  const chain: Record<string, ReturnType<typeof vi.fn>> = {};
  ['select', 'from', 'groupBy'].forEach((method) => {
    chain[method] = vi.fn().mockReturnValue(chain);
  });
  return chain;
};

const mockDb = createChainMock();

vi.mock('../db/index.js', () => ({
  getDatabase: vi.fn(() => mockDb),
}));

vi.mock('../queues/bulk-run.queue.js', () => ({
  getBulkRunQueueCounts: vi.fn(),
}));

import { MetricsService } from './metrics.service.js';
import { frameProjects, outputs } from '../db/schema.js';

describe('MetricsService', () => {
  const queueCounts = vi.fn();

  beforeEach(() => {
    vi.clearAllMocks();
    Object.keys(mockDb).forEach((key) => {
      mockDb[key].mockReset();
      mockDb[key].mockReturnValue(mockDb);
    });
    queueCounts.mockResolvedValue({ waiting: 3, active: 1, failed: 0 });
  });

  it('should count projects and outputs by status with the queue depth', async () => {
    mockDb.groupBy
      .mockResolvedValueOnce([
        { status: 'completed', value: 4 },
        { status: 'processing', value: 1 },
      ])
      .mockResolvedValueOnce([
        { status: 'succeeded', value: 40 },
        { status: 'failed', value: 2 },
      ]);

    const metrics = await new MetricsService(queueCounts).collect();

    expect(metrics).toEqual({
      projects: {
        total: 5,
        byStatus: { draft: 0, coordinates_set: 0, processing: 1, completed: 4, failed: 0 },
      },
      outputs: { total: 42, byStatus: { succeeded: 40, failed: 2 } },
      queue: { waiting: 3, active: 1, failed: 0 },
    });
    expect(mockDb.from).toHaveBeenNthCalledWith(1, frameProjects);
    expect(mockDb.from).toHaveBeenNthCalledWith(2, outputs);
  });

  it('should report zeros for an empty database', async () => {
    mockDb.groupBy.mockResolvedValue([]);

    const metrics = await new MetricsService(queueCounts).collect();

    expect(metrics.projects.total).toBe(0);
    expect(metrics.outputs).toEqual({ total: 0, byStatus: { succeeded: 0, failed: 0 } });
  });

  it('should propagate a queue failure', async () => {
    mockDb.groupBy.mockResolvedValue([]);
    queueCounts.mockRejectedValue(new Error('ECONNREFUSED'));

    await expect(new MetricsService(queueCounts).collect()).rejects.toThrow('ECONNREFUSED');
  });
});
