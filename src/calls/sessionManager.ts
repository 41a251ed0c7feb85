import type { AlertNotifier } from '../alerts/channelAlerts';
import type { VoiceConfig } from '../config/voiceConfig';
import { log } from '../log';
import type { MediaSocket } from '../media/mediaSocket';
import { setSessionsActive } from '../metrics';
import type { CallControl } from '../telnyx/types';
import type { CallRecordStore } from './callRecords';
import { CallSession, type SessionBackends, type SessionSummary, type SessionTiming } from './callSession';
import type { PreloadBroker } from './preloadBroker';
import type { CallContext } from './types';

/** Close code for a policy violation (unknown stream, duplicate session). */
export const POLICY_VIOLATION_CLOSE_CODE = 1008;

export interface SessionManagerOptions {
  preloads: PreloadBroker;
  callControl: CallControl;
  records: CallRecordStore;
  alerts?: AlertNotifier | null;
  loadConfig: () => Promise<Readonly<VoiceConfig>>;
  createBackends: (config: Readonly<VoiceConfig>) => SessionBackends;
  timing?: Partial<SessionTiming>;
  now?: () => number;
}

/** Tracks live call sessions, at most one per call control id. */
export class SessionManager {
  private readonly sessions = new Map<string, CallSession>();
  private readonly claimed = new Set<string>();
  private readonly runs = new Set<Promise<SessionSummary | null>>();
  private closing = false;

  constructor(private readonly options: SessionManagerOptions) {}

  get size(): number {
    return this.claimed.size;
  }

  has(callControlId: string): boolean {
    return this.claimed.has(callControlId);
  }

  get(callControlId: string): CallSession | null {
    return this.sessions.get(callControlId) ?? null;
  }

  /**
   * Runs a session for a socket whose stream id resolved to `context`.
   * Resolves with the session summary, or null when the socket was refused.
   */
  attach(socket: MediaSocket, streamId: string, context: CallContext): Promise<SessionSummary | null> {
    const callControlId = context.callControlId;
    if (this.closing || this.claimed.has(callControlId)) {
      log.warn(
        { event: 'session_rejected', call_control_id: callControlId, stream_id: streamId, shutting_down: this.closing },
        'media socket rejected, session already active',
      );
      return socket.close(POLICY_VIOLATION_CLOSE_CODE, 'session_exists').then(() => null);
    }

    this.claimed.add(callControlId);
    setSessionsActive(this.claimed.size);

    const run = this.runSession(socket, streamId, context).finally(() => {
      this.claimed.delete(callControlId);
      this.sessions.delete(callControlId);
      this.runs.delete(run);
      setSessionsActive(this.claimed.size);
    });
    this.runs.add(run);
    return run;
  }

  /** Stops every session and waits for their teardown. */
  async shutdown(): Promise<void> {
    this.closing = true;
    const sessions = [...this.sessions.values()];
    log.info({ event: 'sessions_draining', count: this.runs.size }, 'draining call sessions');
    await Promise.all(sessions.map((session) => session.stop('shutdown')));
    await Promise.allSettled([...this.runs]);
  }

  private async runSession(socket: MediaSocket, streamId: string, context: CallContext): Promise<SessionSummary | null> {
    let config: Readonly<VoiceConfig>;
    try {
      config = await this.options.loadConfig();
    } catch (error) {
      log.error(
        { event: 'session_config_failed', err: error, call_control_id: context.callControlId },
        'voice config unavailable',
      );
      await socket.close(1011, 'config_unavailable');
      return null;
    }

    const session = new CallSession({
      socket,
      streamId,
      context,
      config,
      backends: this.options.createBackends(config),
      callControl: this.options.callControl,
      preloads: this.options.preloads,
      records: this.options.records,
      alerts: this.options.alerts,
      timing: this.options.timing,
      now: this.options.now,
    });
    this.sessions.set(context.callControlId, session);
    if (this.closing) {
      await session.stop('shutdown');
    }
    return session.run();
  }
}
