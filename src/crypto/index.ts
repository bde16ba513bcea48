export { generateId } from './random.js';
export { secretsEqual } from './compare.js';
