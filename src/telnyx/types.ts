import { z } from 'zod';
import type { WireCodec } from '../audio/codecs';

export type StreamTrack = 'inbound_track' | 'outbound_track' | 'both_tracks';

export interface DialRequest {
  to: string;
  from: string;
  connectionId: string;
  streamUrl?: string;
  codec?: WireCodec;
}

export interface AnswerRequest {
  streamUrl?: string;
  /** Bidirectional media mode; the bridge always uses rtp. */
  mode?: 'rtp' | 'mp3';
  codec?: WireCodec;
}

export interface DialResult {
  callControlId: string;
}

/** Provider call-control surface the session and webhook depend on. */
export interface CallControl {
  dial(request: DialRequest): Promise<DialResult>;
  answer(callControlId: string, request?: AnswerRequest): Promise<void>;
  hangup(callControlId: string): Promise<void>;
}

export const DialResponseSchema = z.object({
  data: z.object({
    call_control_id: z.string().min(1),
    call_leg_id: z.string().optional(),
    call_session_id: z.string().optional(),
  }),
});

export const CallWebhookSchema = z.object({
  data: z.object({
    event_type: z.string().min(1),
    id: z.string().optional(),
    payload: z
      .object({
        call_control_id: z.string().min(1),
        direction: z.string().optional(),
        from: z.string().optional(),
        to: z.string().optional(),
        state: z.string().optional(),
        hangup_cause: z.string().optional(),
      })
      .passthrough(),
  }),
});

export type CallWebhook = z.infer<typeof CallWebhookSchema>;
