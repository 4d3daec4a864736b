export { deterministicSeed } from './seed.js';
export { SeededRandom, seededShuffle } from './random.js';
export { buildCorpus, variantTag } from './builder.js';
