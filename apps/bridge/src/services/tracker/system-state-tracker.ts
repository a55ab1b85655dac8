import type { FlightStatePolicy, TelemetryFrame, TrackEvictionPolicy, UavTrackState } from '@uas-bridge/domain';
import { NeverEvict } from './eviction.policy.js';

export interface SystemStateTrackerOptions {
  flightPolicy: FlightStatePolicy;
  /** Report every UAV as flying, whatever the policy decides. */
  setFlyingWhenGrounded?: boolean;
  evictionPolicy?: TrackEvictionPolicy;
  now?: () => number;
}

/**
 * Per-UAV state keyed by MAVLink system id. The only writer of that state;
 * everything handed out is a frozen snapshot.
 */
export class SystemStateTracker {
  private readonly states = new Map<number, UavTrackState>();
  private readonly evictionPolicy: TrackEvictionPolicy;
  private readonly now: () => number;

  constructor(private readonly options: SystemStateTrackerOptions) {
    this.evictionPolicy = options.evictionPolicy ?? new NeverEvict();
    this.now = options.now ?? Date.now;
  }

  update(systemId: number, frame: TelemetryFrame): UavTrackState {
    const previous = this.states.get(systemId);
    const flying = this.options.flightPolicy.isFlying(frame, previous);
    const now = this.now();

    const next: UavTrackState = Object.freeze({
      systemId,
      isFlying: this.options.setFlyingWhenGrounded === true ? true : flying,
      firstSeen: previous?.firstSeen ?? now,
      lastSeen: now,
      // frames may arrive out of order; the latest processed one wins
      lastFrameTimestamp: frame.timestamp,
      frameCount: (previous?.frameCount ?? 0) + 1,
    });
    this.states.set(systemId, next);
    return next;
  }

  get(systemId: number): UavTrackState | undefined {
    return this.states.get(systemId);
  }

  get size(): number {
    return this.states.size;
  }

  snapshot(): UavTrackState[] {
    return [...this.states.values()];
  }

  /** Removes entries the eviction policy rejects. Returns the evicted system ids. */
  evictStale(now: number = this.now()): number[] {
    const evicted: number[] = [];
    for (const [systemId, state] of this.states) {
      if (this.evictionPolicy.shouldEvict(state, now)) {
        this.states.delete(systemId);
        evicted.push(systemId);
      }
    }
    return evicted;
  }
}
