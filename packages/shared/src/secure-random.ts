import { webcrypto } from 'node:crypto';

export type RandomSource = (maxExclusive: number) => number;

const UINT32_RANGE = 0x1_0000_0000;

// Uniform integer in [0, maxExclusive) from the Web Crypto CSPRNG.
// Draws above the largest multiple of maxExclusive are discarded to avoid modulo bias.
export function secureRandomInt(maxExclusive: number): number {
  if (!Number.isInteger(maxExclusive) || maxExclusive <= 0 || maxExclusive > UINT32_RANGE) {
    throw new RangeError(`Random bound must be an integer in 1..${UINT32_RANGE}`);
  }

  const limit = UINT32_RANGE - (UINT32_RANGE % maxExclusive);
  const buffer = new Uint32Array(1);
  for (;;) {
    webcrypto.getRandomValues(buffer);
    const value = buffer[0];
    if (value !== undefined && value < limit) {
      return value % maxExclusive;
    }
  }
}

export function pickCharacter(source: string | readonly string[], random: RandomSource): string {
  const glyphs = typeof source === 'string' ? [...source] : source;
  const char = glyphs[random(glyphs.length)];
  if (char === undefined) {
    throw new RangeError('Random source returned an index outside the character set');
  }
  return char;
}

// Fisher-Yates.
export function shuffleInPlace<T>(items: T[], random: RandomSource): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = random(i + 1);
    const current = items[i];
    const swap = items[j];
    if (current === undefined || swap === undefined) {
      throw new RangeError('Random source returned an index outside the shuffle range');
    }
    items[i] = swap;
    items[j] = current;
  }
  return items;
}
