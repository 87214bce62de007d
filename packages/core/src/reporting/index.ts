export {
  jsonReplacer,
  serialiseError,
  writeJson,
  writeLine,
} from './formatting.js';

export type { WritableTarget, WriteJsonOptions } from './formatting.js';
