import { z } from 'zod';

const ConnectedSchema = z.object({ event: z.literal('connected') }).passthrough();

const StartSchema = z
  .object({
    event: z.literal('start'),
    stream_id: z.string().min(1).optional(),
    start: z
      .object({
        call_control_id: z.string().optional(),
        media_format: z
          .object({
            encoding: z.string().optional(),
            sample_rate: z.number().optional(),
            channels: z.number().optional(),
          })
          .passthrough()
          .optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const MediaSchema = z
  .object({
    event: z.literal('media'),
    stream_id: z.string().min(1).optional(),
    media: z
      .object({
        payload: z.string(),
        track: z.string().optional(),
        chunk: z.union([z.string(), z.number()]).optional(),
        timestamp: z.union([z.string(), z.number()]).optional(),
      })
      .passthrough(),
  })
  .passthrough();

const StopSchema = z
  .object({ event: z.literal('stop'), stream_id: z.string().optional() })
  .passthrough();

const StreamEventSchema = z.discriminatedUnion('event', [
  ConnectedSchema,
  StartSchema,
  MediaSchema,
  StopSchema,
]);

export type StreamEvent = z.infer<typeof StreamEventSchema>;
export type MediaEvent = z.infer<typeof MediaSchema>;

export type ParsedStreamEvent =
  | { ok: true; event: StreamEvent }
  | { ok: true; event: { event: 'unknown'; name: string } }
  | { ok: false; error: string };

export type MediaTrack = 'inbound' | 'outbound' | 'unknown';

export function normalizeTelnyxTrack(track: string | undefined): MediaTrack {
  if (!track) return 'inbound';
  const normalized = track.trim().toLowerCase();
  if (normalized === 'inbound' || normalized === 'inbound_track') return 'inbound';
  if (normalized === 'outbound' || normalized === 'outbound_track') return 'outbound';
  return 'unknown';
}

const KNOWN_EVENTS = new Set(['connected', 'start', 'media', 'stop']);

/** Parses one inbound text frame of the media protocol. */
export function parseStreamEvent(text: string): ParsedStreamEvent {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return { ok: false, error: 'invalid_json' };
  }

  const name = typeof raw === 'object' && raw !== null && 'event' in raw ? raw.event : undefined;
  if (typeof name !== 'string') {
    return { ok: false, error: 'missing_event' };
  }
  if (!KNOWN_EVENTS.has(name)) {
    return { ok: true, event: { event: 'unknown', name } };
  }

  const parsed = StreamEventSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: `invalid_${name}_event` };
  }
  return { ok: true, event: parsed.data };
}
