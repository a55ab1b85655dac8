import type { UavTrackState } from '../../entities/uav-track-state.js';

export interface TrackEvictionPolicy {
  shouldEvict(state: UavTrackState, now: number): boolean;
}
