/** Uniform float in [0, 1). Injected so tests can pin the order. */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

export function randomIndex(length: number, random: RandomSource): number {
  return Math.min(length - 1, Math.floor(random() * length));
}

/** Fisher-Yates, in place. */
export function shuffleInPlace<T>(items: T[], random: RandomSource = defaultRandom): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = randomIndex(i + 1, random);
    const held = items[i];
    items[i] = items[j];
    items[j] = held;
  }
  return items;
}
