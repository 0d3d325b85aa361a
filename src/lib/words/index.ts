export { chunkWords, convertBookFile, convertBookText, formatBookUnits } from './book';
export type { ConvertBookOptions } from './book';
export { createRng, hashString, seedFromTime } from './rng';
export type { Rng } from './rng';
export {
  BUNDLED_WORD_LISTS,
  WORDLISTS_DIR,
  bundledWordListPath,
  loadWordList,
  parseWordList,
} from './word-lists';
export type { LoadedWordList } from './word-lists';
export {
  buildWordSource,
  createRandomWordSource,
  createSequentialWordSource,
  decorateWord,
} from './word-source';
export type { RandomWordSourceOptions, WordSequenceSource } from './word-source';
