export { isValid, verifyFile, computeHashes } from './content-verifier.js';
export type { ComputedHashes } from './content-verifier.js';
