import { StrategyEvent as StrategyEventModel, StrategyEventName } from '../models/StrategyEvent';
import { Timestamp } from '../types';
import { bigintReplacer } from '../utils/bps';
import { logger } from '../utils/logger';
import { StrategyEvent } from './strategy-events';

export interface EventRecord {
  type: StrategyEventName;
  subject: string;
  payload: Record<string, unknown>;
  emittedAt: number;
}

/** Who an event is about: the user for lifecycle events, the caller for governance ones. */
export function subjectOf(event: StrategyEvent): string {
  switch (event.type) {
    case 'ConfigurationChanged':
    case 'HighWaterMarkUpdated':
      return event.caller;
    case 'LockCreated':
    case 'LockReleased':
    case 'PerformanceFeeCharged':
      return event.user;
  }
}

export function toEventRecord(event: StrategyEvent, emittedAt: Timestamp): EventRecord {
  const { type, ...fields } = event;
  const payload: Record<string, unknown> = JSON.parse(JSON.stringify(fields, bigintReplacer));
  return { type, subject: subjectOf(event), payload, emittedAt: Number(emittedAt) };
}

export interface EventQuery {
  subject?: string;
  type?: StrategyEventName;
}

export interface EventStore {
  create(record: EventRecord): Promise<unknown>;
  /** Newest first. */
  find(query: EventQuery, limit: number): Promise<unknown[]>;
}

const mongoEventStore: EventStore = {
  create: (record) => StrategyEventModel.create(record),
  find: (query, limit) => StrategyEventModel.find(query).sort({ createdAt: -1 }).limit(limit).lean().exec(),
};

/**
 * Persists committed strategy notifications for indexing. Writes are
 * fire-and-forget; a failed write is logged and never reaches the caller.
 */
export class EventLogService {
  constructor(private readonly store: EventStore = mongoEventStore) {}

  record(event: StrategyEvent, emittedAt: Timestamp): void {
    const record = toEventRecord(event, emittedAt);
    this.store.create(record).catch((err: unknown) => {
      logger.warn(`Failed to persist ${record.type} event: ${err instanceof Error ? err.message : String(err)}`);
    });
  }

  async listEvents(filter: EventQuery & { limit?: number } = {}): Promise<unknown[]> {
    const query: EventQuery = {};
    if (filter.subject) query.subject = filter.subject;
    if (filter.type) query.type = filter.type;
    const limit = Math.min(Math.max(filter.limit ?? 50, 1), 500);
    return this.store.find(query, limit);
  }
}

export const eventLogService = new EventLogService();
