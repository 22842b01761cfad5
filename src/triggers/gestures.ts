/**
 * Hand gesture classification
 *
 * Landmarks follow the 21-point hand model: index 0 is the wrist, fingertips
 * are 8/12/16/20 and the matching PIP joints 6/10/14/18. Image coordinates
 * grow downward, so a fingertip "above" its joint has the smaller y.
 */

export interface Landmark {
  x: number;
  y: number;
  z?: number;
}

export type Hand = readonly Landmark[];

export type Gesture = 'open-palm' | 'fist' | 'victory';

export const HAND_LANDMARK_COUNT = 21;

const INDEX = { tip: 8, pip: 6 } as const;
const MIDDLE = { tip: 12, pip: 10 } as const;
const RING = { tip: 16, pip: 14 } as const;
const PINKY = { tip: 20, pip: 18 } as const;

type Finger = { readonly tip: number; readonly pip: number };

const FINGERS: readonly Finger[] = [INDEX, MIDDLE, RING, PINKY];

function isExtended(hand: Hand, finger: Finger): boolean {
  const tip = hand[finger.tip];
  const pip = hand[finger.pip];
  if (!tip || !pip) return false;
  return tip.y < pip.y;
}

function isCurled(hand: Hand, finger: Finger): boolean {
  const tip = hand[finger.tip];
  const pip = hand[finger.pip];
  if (!tip || !pip) return false;
  return tip.y > pip.y;
}

/** All four fingertips above their joints. */
export function isOpenPalm(hand: Hand): boolean {
  return FINGERS.every(finger => isExtended(hand, finger));
}

/** All four fingertips below their joints. */
export function isClosedFist(hand: Hand): boolean {
  return FINGERS.every(finger => isCurled(hand, finger));
}

/** Index and middle up, ring and pinky down. */
export function isVictory(hand: Hand): boolean {
  return isExtended(hand, INDEX) && isExtended(hand, MIDDLE) && isCurled(hand, RING) && isCurled(hand, PINKY);
}

export function classifyGesture(hand: Hand): Gesture | null {
  if (isOpenPalm(hand)) return 'open-palm';
  if (isClosedFist(hand)) return 'fist';
  if (isVictory(hand)) return 'victory';
  return null;
}

function isLandmark(value: unknown): value is Landmark {
  if (typeof value !== 'object' || value === null) return false;
  if (!('x' in value) || typeof value.x !== 'number') return false;
  if (!('y' in value) || typeof value.y !== 'number') return false;
  return !('z' in value) || value.z === undefined || typeof value.z === 'number';
}

function isHand(value: unknown): value is Hand {
  return Array.isArray(value) && value.length === HAND_LANDMARK_COUNT && value.every(isLandmark);
}

/**
 * Parse one NDJSON frame: `{"hands": [[{x, y, z}, ...21], ...]}`.
 * Returns null for anything malformed; a frame with no hands is `[]`.
 */
export function parseFrame(line: string): Hand[] | null {
  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch {
    return null;
  }
  if (typeof data !== 'object' || data === null || !('hands' in data)) return null;
  const hands = data.hands;
  if (!Array.isArray(hands) || !hands.every(isHand)) return null;
  return hands;
}
