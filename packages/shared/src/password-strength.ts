import { CHARACTER_CLASSES, classifyCharacter, type CharacterClassName } from './character-classes';

export const STRENGTH_LABELS = ['Very Weak', 'Weak', 'Fair', 'Strong', 'Very Strong'] as const;
export type StrengthLabel = (typeof STRENGTH_LABELS)[number];

export type StrengthAssessment = {
  entropyBits: number;
  label: StrengthLabel;
};

// Lower bound (inclusive) of each band, strongest first.
const STRENGTH_THRESHOLDS: ReadonlyArray<readonly [number, StrengthLabel]> = [
  [90, 'Very Strong'],
  [70, 'Strong'],
  [50, 'Fair'],
  [30, 'Weak'],
];

// Heuristic only: sized from the classes present in the string, not from how it was generated.
export function calculateEntropy(password: string): number {
  if (!password) {
    return 0;
  }

  const glyphs = [...password];
  const present = new Set<CharacterClassName>();
  for (const char of glyphs) {
    const name = classifyCharacter(char);
    if (name) {
      present.add(name);
    }
  }

  let alphabetSize = 0;
  for (const name of present) {
    alphabetSize += CHARACTER_CLASSES[name].length;
  }
  if (alphabetSize === 0) {
    return 0;
  }

  return Math.log2(alphabetSize) * glyphs.length;
}

export function strengthForEntropy(entropyBits: number): StrengthLabel {
  for (const [threshold, label] of STRENGTH_THRESHOLDS) {
    if (entropyBits >= threshold) {
      return label;
    }
  }
  return 'Very Weak';
}

export function assessStrength(password: string): StrengthLabel {
  return strengthForEntropy(calculateEntropy(password));
}

export function scorePassword(password: string): StrengthAssessment {
  const entropyBits = calculateEntropy(password);
  return { entropyBits, label: strengthForEntropy(entropyBits) };
}
