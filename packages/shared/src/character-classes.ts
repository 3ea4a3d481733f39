export const CHARACTER_CLASS_NAMES = ['lowercase', 'uppercase', 'digits', 'symbols'] as const;
export type CharacterClassName = (typeof CHARACTER_CLASS_NAMES)[number];

export const CHARACTER_CLASSES: Readonly<Record<CharacterClassName, string>> = {
  lowercase: 'abcdefghijklmnopqrstuvwxyz',
  uppercase: 'ABCDEFGHIJKLMNOPQRSTUVWXYZ',
  digits: '0123456789',
  // Every printable ASCII punctuation glyph.
  symbols: '!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~',
};

export const AMBIGUOUS_CHARACTERS = '0O1lI';

const CLASS_BY_CHARACTER = new Map<string, CharacterClassName>(
  CHARACTER_CLASS_NAMES.flatMap((name) =>
    [...CHARACTER_CLASSES[name]].map((char): [string, CharacterClassName] => [char, name]),
  ),
);

export function classifyCharacter(char: string): CharacterClassName | null {
  return CLASS_BY_CHARACTER.get(char) ?? null;
}

export function isAmbiguousCharacter(char: string): boolean {
  return AMBIGUOUS_CHARACTERS.includes(char);
}
