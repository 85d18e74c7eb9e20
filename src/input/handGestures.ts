import { DEFAULT_GESTURE_DEBOUNCE_MS } from '../core/constants';
import { systemClock, type Clock } from '../core/runner';
import type { GestureSink } from './gestures';

/** One normalized hand landmark from the external tracker. */
export interface Landmark {
  x: number;
  y: number;
}

// 21-point hand model.
export const HAND = {
  WRIST: 0,
  THUMB_TIP: 4,
  INDEX_PIP: 6,
  INDEX_TIP: 8,
  MIDDLE_PIP: 10,
  MIDDLE_TIP: 12,
  RING_PIP: 14,
  RING_TIP: 16,
  PINKY_PIP: 18,
  PINKY_TIP: 20,
} as const;

export const HAND_LANDMARK_COUNT = 21;

export interface HandPose {
  index: boolean;
  middle: boolean;
  ring: boolean;
  pinky: boolean;
  /** Horizontal index-tip position, 0 = left and 1 = right. */
  pointerX: number;
}

// Frames arrive rotated a quarter turn, so extension shows up on x.
function extended(hand: readonly Landmark[], tip: number, pip: number): boolean {
  return hand[tip].x < hand[pip].x;
}

export function classifyHand(hand: readonly Landmark[]): HandPose | null {
  if (hand.length < HAND_LANDMARK_COUNT) return null;
  return {
    index: extended(hand, HAND.INDEX_TIP, HAND.INDEX_PIP),
    middle: extended(hand, HAND.MIDDLE_TIP, HAND.MIDDLE_PIP),
    ring: extended(hand, HAND.RING_TIP, HAND.RING_PIP),
    pinky: extended(hand, HAND.PINKY_TIP, HAND.PINKY_PIP),
    pointerX: Math.min(1, Math.max(0, 1 - hand[HAND.INDEX_TIP].y)),
  };
}

export function isFist(pose: HandPose): boolean {
  return !pose.index && !pose.middle && !pose.ring && !pose.pinky;
}

export function isTwoFinger(pose: HandPose): boolean {
  return pose.index && pose.middle && !pose.ring && !pose.pinky;
}

export interface HandGestureDetectorOptions {
  debounceMs?: number;
  clock?: Clock;
}

/**
 * Turns per-frame landmarks into gesture events. The pointer is reported
 * every frame; fist and two-finger triggers each have their own debounce.
 */
export class HandGestureDetector {
  private lastFistAt = -Infinity;
  private lastTwoFingerAt = -Infinity;
  private debounceMs: number;
  private readonly clock: Clock;

  constructor(
    private sink: GestureSink,
    options: HandGestureDetectorOptions = {},
  ) {
    this.debounceMs = options.debounceMs ?? DEFAULT_GESTURE_DEBOUNCE_MS;
    this.clock = options.clock ?? systemClock;
  }

  setDebounce(ms: number): void {
    this.debounceMs = ms;
  }

  /** `hands` holds zero or more hands; only the first one is used. */
  process(hands: ReadonlyArray<readonly Landmark[]>): void {
    const pose = hands.length > 0 ? classifyHand(hands[0]) : null;
    if (pose === null) {
      this.sink.pointerMoved(0, false);
      return;
    }

    if (pose.index) {
      this.sink.pointerMoved(pose.pointerX, true);
    } else {
      this.sink.pointerMoved(0, false);
    }

    const now = this.clock.now();
    if (isFist(pose) && now - this.lastFistAt > this.debounceMs) {
      this.lastFistAt = now;
      this.sink.fistGesture();
    }
    if (isTwoFinger(pose) && now - this.lastTwoFingerAt > this.debounceMs) {
      this.lastTwoFingerAt = now;
      this.sink.twoFingerGesture();
    }
  }
}
