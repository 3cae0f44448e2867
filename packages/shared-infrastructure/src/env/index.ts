export {
  type LoadEnvOptions,
  type LoadEnvSummary,
  loadEnvFiles,
  readBool,
  readFirst,
  readInt,
  readString,
} from './loaders.js';
