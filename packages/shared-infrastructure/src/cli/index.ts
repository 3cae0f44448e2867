export { parsePositiveInt } from './options.js';
