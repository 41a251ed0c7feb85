export type GateState = 'idle' | 'speaking';

/**
 * Idle/Speaking state for one session. acquire() hands back a release
 * function bound to that acquisition; a stale release (after a newer
 * acquire) does nothing, and releasing twice is harmless.
 */
export class SpeakingGate {
  private holder: { token: number; owner: string } | null = null;
  private nextToken = 1;

  get state(): GateState {
    return this.holder ? 'speaking' : 'idle';
  }

  get isHeld(): boolean {
    return this.holder !== null;
  }

  get owner(): string | null {
    return this.holder?.owner ?? null;
  }

  acquire(owner: string): () => void {
    const token = this.nextToken;
    this.nextToken += 1;
    this.holder = { token, owner };
    return () => {
      if (this.holder?.token === token) {
        this.holder = null;
      }
    };
  }
}
