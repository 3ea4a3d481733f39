export * from './character-classes';
export * from './generation-config';
export * from './password-generator';
export * from './password-strength';
export * from './secure-random';
