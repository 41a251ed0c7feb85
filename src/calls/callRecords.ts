import { z } from 'zod';
import { env } from '../env';
import { log } from '../log';
import { getRedisClient } from '../redis/client';
import type { CallDirection } from './types';

export type CallStatus = 'initiated' | 'ringing' | 'completed' | 'failed' | 'rejected';

export interface CallRecord {
  id: string;
  callControlId?: string;
  direction: CallDirection;
  from: string;
  to: string;
  status: CallStatus;
  assignedUserId?: string;
  durationSeconds?: number;
  transcript?: string;
  cost?: number;
  error?: string;
  createdAt: string;
  updatedAt: string;
}

export type NewCallRecord = Pick<CallRecord, 'direction' | 'from' | 'to' | 'status'> &
  Partial<Pick<CallRecord, 'callControlId' | 'assignedUserId' | 'error'>>;

export type CallRecordPatch = Partial<
  Pick<CallRecord, 'status' | 'durationSeconds' | 'transcript' | 'cost' | 'error' | 'callControlId'>
>;

/** Narrow persistence contract for call records. */
export interface CallRecordStore {
  create(input: NewCallRecord): Promise<CallRecord>;
  get(id: string): Promise<CallRecord | null>;
  findLatestByCallControlId(callControlId: string): Promise<CallRecord | null>;
  update(id: string, patch: CallRecordPatch): Promise<CallRecord | null>;
}

const StoredCallRecordSchema = z.object({
  id: z.string().min(1),
  callControlId: z.string().min(1).optional(),
  direction: z.enum(['inbound', 'outbound']),
  from: z.string(),
  to: z.string(),
  status: z.enum(['initiated', 'ringing', 'completed', 'failed', 'rejected']),
  assignedUserId: z.string().min(1).optional(),
  durationSeconds: z.coerce.number().int().nonnegative().optional(),
  transcript: z.string().optional(),
  cost: z.coerce.number().nonnegative().optional(),
  error: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

function toHashFields(values: Record<string, string | number | undefined>): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) {
      fields[key] = String(value);
    }
  }
  return fields;
}

/** The Redis commands the record store issues. */
export interface RecordHashStore {
  incr(key: string): Promise<number>;
  hset(key: string, fields: Record<string, string>): Promise<number>;
  hgetall(key: string): Promise<Record<string, string>>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
}

/**
 * Records live in a hash per id (`<prefix>:<id>`); `<prefix>:ctl:<callControlId>`
 * points at the newest record for a provider call id.
 */
export class RedisCallRecordStore implements CallRecordStore {
  constructor(
    private readonly redis: RecordHashStore = getRedisClient(),
    private readonly prefix: string = env.CALLREC_PREFIX,
  ) {}

  public async create(input: NewCallRecord): Promise<CallRecord> {
    const id = String(await this.redis.incr(`${this.prefix}:seq`));
    const now = new Date().toISOString();
    const record: CallRecord = { ...input, id, createdAt: now, updatedAt: now };

    await this.redis.hset(this.recordKey(id), toHashFields({ ...record }));
    if (record.callControlId) {
      await this.redis.set(this.controlKey(record.callControlId), id);
    }
    log.info(
      { event: 'call_record_created', record_id: id, call_control_id: record.callControlId, status: record.status },
      'call record created',
    );
    return record;
  }

  public async get(id: string): Promise<CallRecord | null> {
    const raw = await this.redis.hgetall(this.recordKey(id));
    if (Object.keys(raw).length === 0) {
      return null;
    }
    const parsed = StoredCallRecordSchema.safeParse(raw);
    if (!parsed.success) {
      log.error({ record_id: id, issues: parsed.error.issues }, 'call record invalid');
      return null;
    }
    return parsed.data;
  }

  public async findLatestByCallControlId(callControlId: string): Promise<CallRecord | null> {
    const id = await this.redis.get(this.controlKey(callControlId));
    return id ? this.get(id) : null;
  }

  public async update(id: string, patch: CallRecordPatch): Promise<CallRecord | null> {
    const existing = await this.get(id);
    if (!existing) {
      return null;
    }
    const updated: CallRecord = { ...existing, ...patch, updatedAt: new Date().toISOString() };
    await this.redis.hset(this.recordKey(id), toHashFields({ ...patch, updatedAt: updated.updatedAt }));
    if (patch.callControlId) {
      await this.redis.set(this.controlKey(patch.callControlId), id);
    }
    return updated;
  }

  private recordKey(id: string): string {
    return `${this.prefix}:${id}`;
  }

  private controlKey(callControlId: string): string {
    return `${this.prefix}:ctl:${callControlId}`;
  }
}
