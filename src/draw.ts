import crypto from "node:crypto";

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export type PlacedWinner<T> = {
  participant: T;
  place: number;
};

export function createDrawSeed(): string {
  return crypto.randomBytes(16).toString("hex");
}

/**
 * Counter-mode PRNG over SHA-256. The same seed always replays the same
 * sequence, so a persisted seed is enough to audit a finished draw.
 */
export function createSeededRandom(seed: string): RandomSource {
  let counter = 0;
  return () => {
    const digest = crypto.createHash("sha256").update(`${seed}:${counter}`).digest();
    counter += 1;
    // 48 bits fit exactly into a double.
    return digest.readUIntBE(0, 6) / 2 ** 48;
  };
}

function pickIndex(random: RandomSource, bound: number): number {
  const value = Math.floor(random() * bound);
  return Math.min(Math.max(value, 0), bound - 1);
}

/**
 * Uniform sample of `min(requestedPlaces, pool.length)` distinct entries
 * (partial Fisher-Yates). Places follow the order the sample is drawn in.
 */
export function selectWinners<T>(
  pool: readonly T[],
  requestedPlaces: number,
  random: RandomSource = Math.random,
): PlacedWinner<T>[] {
  const count = Math.min(Math.max(0, Math.floor(requestedPlaces)), pool.length);
  if (count === 0) {
    return [];
  }

  const working = [...pool];
  const winners: PlacedWinner<T>[] = [];
  for (let i = 0; i < count; i++) {
    const j = i + pickIndex(random, working.length - i);
    const picked = working[j];
    const displaced = working[i];
    if (picked === undefined || displaced === undefined) {
      break;
    }
    working[j] = displaced;
    working[i] = picked;
    winners.push({ participant: picked, place: i + 1 });
  }
  return winners;
}

export function shuffle<T>(items: readonly T[], random: RandomSource = Math.random): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = pickIndex(random, i + 1);
    const current = result[i];
    const swap = result[j];
    if (current === undefined || swap === undefined) {
      continue;
    }
    result[i] = swap;
    result[j] = current;
  }
  return result;
}
