import type { TrackEvictionPolicy, UavTrackState } from '@uas-bridge/domain';

export class NeverEvict implements TrackEvictionPolicy {
  shouldEvict(): boolean {
    return false;
  }
}

/** Drops a UAV that has not been heard from for `ttlSeconds`. */
export class IdleTimeoutEviction implements TrackEvictionPolicy {
  private readonly ttlMs: number;

  constructor(ttlSeconds: number) {
    this.ttlMs = ttlSeconds * 1000;
  }

  shouldEvict(state: UavTrackState, now: number): boolean {
    return now - state.lastSeen > this.ttlMs;
  }
}
