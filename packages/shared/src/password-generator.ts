import {
  CHARACTER_CLASSES,
  isAmbiguousCharacter,
  type CharacterClassName,
} from './character-classes';
import { selectedClasses, type GenerationConfig } from './generation-config';
import { pickCharacter, secureRandomInt, shuffleInPlace, type RandomSource } from './secure-random';

export const MAX_DRAW_ATTEMPTS = 32;
export const MAX_SHUFFLE_ATTEMPTS = 64;

export type PasswordGenerationErrorCode =
  | 'invalid_length'
  | 'no_character_class'
  | 'empty_character_pool'
  | 'length_too_short'
  | 'degenerate_character_pool'
  | 'repeat_exclusion_unsatisfiable';

const ERROR_MESSAGES: Record<PasswordGenerationErrorCode, string> = {
  invalid_length: 'Length must be a non-negative whole number',
  no_character_class: 'At least one character type must be selected',
  empty_character_pool: 'No usable characters remain after exclusions',
  length_too_short: 'Length too short to include required characters',
  degenerate_character_pool:
    'Consecutive repeats cannot be excluded with fewer than 2 distinct usable characters',
  repeat_exclusion_unsatisfiable: 'Unable to arrange the password without consecutive repeats',
};

export class PasswordGenerationError extends Error {
  readonly code: PasswordGenerationErrorCode;

  constructor(code: PasswordGenerationErrorCode, message = ERROR_MESSAGES[code]) {
    super(message);
    this.name = 'PasswordGenerationError';
    this.code = code;
  }
}

export function buildCharacterPool(config: GenerationConfig): string {
  const pool = selectedClasses(config)
    .map((name) => CHARACTER_CLASSES[name])
    .join('');

  if (!config.excludeAmbiguous) {
    return pool;
  }
  return [...pool].filter((char) => !isAmbiguousCharacter(char)).join('');
}

// Drawn from the unfiltered class strings: ambiguous exclusion only applies to the shared pool.
export function drawRequiredCharacters(
  classes: readonly CharacterClassName[],
  random: RandomSource = secureRandomInt,
): string[] {
  return classes.map((name) => pickCharacter(CHARACTER_CLASSES[name], random));
}

function drawDistinctFrom(
  glyphs: readonly string[],
  previous: string | null,
  random: RandomSource,
): string {
  for (let attempt = 0; attempt < MAX_DRAW_ATTEMPTS; attempt++) {
    const char = pickCharacter(glyphs, random);
    if (char !== previous) {
      return char;
    }
  }

  const fallback = glyphs.find((char) => char !== previous);
  if (fallback === undefined) {
    throw new PasswordGenerationError('degenerate_character_pool');
  }
  return fallback;
}

export function fillFromPool(
  pool: string,
  count: number,
  excludeConsecutiveRepeats: boolean,
  random: RandomSource = secureRandomInt,
): string[] {
  if (count <= 0) {
    return [];
  }

  const glyphs = [...pool];
  if (glyphs.length === 0) {
    throw new PasswordGenerationError('empty_character_pool');
  }
  if (excludeConsecutiveRepeats && new Set(glyphs).size < 2) {
    throw new PasswordGenerationError('degenerate_character_pool');
  }

  const filled: string[] = [];
  let previous: string | null = null;
  for (let position = 0; position < count; position++) {
    const char: string = excludeConsecutiveRepeats
      ? drawDistinctFrom(glyphs, previous, random)
      : pickCharacter(glyphs, random);
    filled.push(char);
    previous = char;
  }
  return filled;
}

function mostFrequent(chars: readonly string[]): [string, number] | null {
  const counts = new Map<string, number>();
  for (const char of chars) {
    counts.set(char, (counts.get(char) ?? 0) + 1);
  }

  let top: [string, number] | null = null;
  for (const entry of counts) {
    if (!top || entry[1] > top[1]) {
      top = entry;
    }
  }
  return top;
}

/**
 * Swaps filled glyphs until no glyph takes more than ceil(n / 2) of the
 * combined sequence, so an arrangement without adjacent repeats exists.
 * Required characters are never touched.
 */
export function balanceFill(
  required: readonly string[],
  filled: readonly string[],
  pool: string,
  random: RandomSource = secureRandomInt,
): string[] {
  const balanced = [...filled];
  const limit = Math.ceil((required.length + balanced.length) / 2);
  const distinct = [...new Set(pool)];

  for (;;) {
    const combined = [...required, ...balanced];
    const top = mostFrequent(combined);
    if (!top || top[1] <= limit) {
      return balanced;
    }

    const [glyph] = top;
    const positions = balanced.flatMap((char, index) => (char === glyph ? [index] : []));
    const replacements = distinct.filter(
      (char) => char !== glyph && combined.filter((other) => other === char).length < limit,
    );
    if (positions.length === 0 || replacements.length === 0) {
      throw new PasswordGenerationError('repeat_exclusion_unsatisfiable');
    }

    const position = pickIndex(positions, random);
    balanced[position] = pickCharacter(replacements, random);
  }
}

function pickIndex(indices: readonly number[], random: RandomSource): number {
  const index = indices[random(indices.length)];
  if (index === undefined) {
    throw new RangeError('Random source returned an index outside the candidate range');
  }
  return index;
}

export function hasAdjacentRepeat(chars: readonly string[]): boolean {
  return chars.some((char, index) => index > 0 && char === chars[index - 1]);
}

/**
 * Lays glyphs out most-frequent first on even indices, then on odd indices.
 * Returns null when one glyph occurs more than ceil(n / 2) times, since no
 * arrangement without adjacent repeats exists then.
 */
export function arrangeWithoutAdjacentRepeats(chars: readonly string[]): string[] | null {
  const counts = new Map<string, number>();
  for (const char of chars) {
    counts.set(char, (counts.get(char) ?? 0) + 1);
  }

  const ordered = [...counts.entries()].sort((a, b) => b[1] - a[1]);
  const mostFrequent = ordered[0];
  if (mostFrequent && mostFrequent[1] > Math.ceil(chars.length / 2)) {
    return null;
  }

  const result: string[] = new Array<string>(chars.length);
  let index = 0;
  for (const [char, count] of ordered) {
    for (let placed = 0; placed < count; placed++) {
      result[index] = char;
      index += 2;
      if (index >= chars.length) {
        index = 1;
      }
    }
  }
  return result;
}

function separateAdjacentRepeats(chars: string[], random: RandomSource): string[] | null {
  for (let reshuffles = 0; hasAdjacentRepeat(chars); reshuffles++) {
    if (reshuffles === MAX_SHUFFLE_ATTEMPTS) {
      return arrangeWithoutAdjacentRepeats(chars);
    }
    shuffleInPlace(chars, random);
  }
  return chars;
}

export function generatePassword(
  config: GenerationConfig,
  random: RandomSource = secureRandomInt,
): string {
  if (!Number.isInteger(config.length) || config.length < 0) {
    throw new PasswordGenerationError('invalid_length');
  }

  const classes = selectedClasses(config);
  if (classes.length === 0) {
    throw new PasswordGenerationError('no_character_class');
  }

  const pool = buildCharacterPool(config);
  if (pool.length === 0) {
    throw new PasswordGenerationError('empty_character_pool');
  }

  const fillCount = config.length - classes.length;
  if (fillCount < 0) {
    throw new PasswordGenerationError('length_too_short');
  }

  const required = drawRequiredCharacters(classes, random);
  const filled = fillFromPool(pool, fillCount, config.excludeConsecutiveRepeats, random);
  const chars = [
    ...required,
    ...(config.excludeConsecutiveRepeats ? balanceFill(required, filled, pool, random) : filled),
  ];
  shuffleInPlace(chars, random);

  if (!config.excludeConsecutiveRepeats) {
    return chars.join('');
  }

  const arranged = separateAdjacentRepeats(chars, random);
  if (!arranged) {
    throw new PasswordGenerationError('repeat_exclusion_unsatisfiable');
  }
  return arranged.join('');
}
