// Pattern edit engine
export * from './types.js';
export * from './errors.js';
export * from './pattern-matcher.js';
export * from './verifier.js';
export * from './edit-applier.js';
export * from './edit-session.js';
export * from './outcome-format.js';
export * from './diff.js';
