import { z } from 'zod';
import { CHARACTER_CLASS_NAMES, type CharacterClassName } from './character-classes';

export const PASSWORD_LENGTH_MIN = 1;
export const PASSWORD_LENGTH_MAX = 128;

export type GenerationConfig = Readonly<{
  length: number;
  includeUppercase: boolean;
  includeLowercase: boolean;
  includeDigits: boolean;
  includeSymbols: boolean;
  excludeConsecutiveRepeats: boolean;
  excludeAmbiguous: boolean;
}>;

export const DEFAULT_GENERATION_CONFIG: GenerationConfig = Object.freeze({
  length: 16,
  includeUppercase: true,
  includeLowercase: true,
  includeDigits: true,
  includeSymbols: true,
  excludeConsecutiveRepeats: true,
  excludeAmbiguous: false,
});

type ClassFlag = Extract<keyof GenerationConfig, `include${string}`>;

const CLASS_FLAGS: Record<CharacterClassName, ClassFlag> = {
  lowercase: 'includeLowercase',
  uppercase: 'includeUppercase',
  digits: 'includeDigits',
  symbols: 'includeSymbols',
};

export function selectedClasses(config: GenerationConfig): CharacterClassName[] {
  return CHARACTER_CLASS_NAMES.filter((name) => config[CLASS_FLAGS[name]]);
}

// A flag that is present but not a boolean falls back to its default instead of failing the request.
function lenientFlag(defaultValue: boolean) {
  return z.boolean().default(defaultValue).catch(defaultValue);
}

export const generationRequestSchema = z.object({
  length: z
    .number({ message: 'Length must be a number' })
    .int('Length must be a whole number')
    .min(PASSWORD_LENGTH_MIN, `Length must be at least ${PASSWORD_LENGTH_MIN}`)
    .max(PASSWORD_LENGTH_MAX, `Length must be at most ${PASSWORD_LENGTH_MAX}`)
    .default(DEFAULT_GENERATION_CONFIG.length),
  includeUppercase: lenientFlag(DEFAULT_GENERATION_CONFIG.includeUppercase),
  includeLowercase: lenientFlag(DEFAULT_GENERATION_CONFIG.includeLowercase),
  includeDigits: lenientFlag(DEFAULT_GENERATION_CONFIG.includeDigits),
  includeSymbols: lenientFlag(DEFAULT_GENERATION_CONFIG.includeSymbols),
  excludeConsecutiveRepeats: lenientFlag(DEFAULT_GENERATION_CONFIG.excludeConsecutiveRepeats),
  excludeAmbiguous: lenientFlag(DEFAULT_GENERATION_CONFIG.excludeAmbiguous),
});

export function createGenerationConfig(overrides: Partial<GenerationConfig> = {}): GenerationConfig {
  return Object.freeze({ ...DEFAULT_GENERATION_CONFIG, ...overrides });
}
