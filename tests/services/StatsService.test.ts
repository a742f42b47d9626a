import { describe, it, expect, beforeEach } from 'vitest';
import { StatsService } from '../../src/services/StatsService.js';
import { PersistenceError } from '../../src/errors.js';
import { MockEvaluationRepository } from '../mocks/MockEvaluationRepository.js';

function row() {
  return {
    chat_history: [{ role: 'user' as const, content: 'Hello' }],
    exact_turn: 'Hello',
    thumbs: 'up' as const,
    user_id: 'user_123',
    session_id: 'session_456',
    chat_id: 'chat_789',
    chat_created_at: '2025-11-12T10:30:00Z',
    thumbs_created_at: '2025-11-12T10:31:00Z',
    received_at: '2025-11-12T10:31:01.000Z',
  };
}

describe('StatsService', () => {
  let repo: MockEvaluationRepository;
  let service: StatsService;

  beforeEach(() => {
    repo = new MockEvaluationRepository();
    service = new StatsService(repo);
  });

  it('should report zero for an empty store', async () => {
    expect(await service.getStats()).toEqual({ total_evaluations: 0 });
  });

  it('should report the number of stored evaluations', async () => {
    await repo.insert(row());
    await repo.insert(row());
    await repo.insert(row());

    expect(await service.getStats()).toEqual({ total_evaluations: 3 });
  });

  it('should not change the count by reading it', async () => {
    await repo.insert(row());

    await service.getStats();
    await service.getStats();

    expect(await service.getStats()).toEqual({ total_evaluations: 1 });
  });

  it('should propagate PersistenceError when the store is down', async () => {
    repo.failWith(new Error('timeout'));

    await expect(service.getStats()).rejects.toBeInstanceOf(PersistenceError);
  });
});
