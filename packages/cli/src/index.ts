export const name = '@plugver/cli';

export { createProgram, run } from './program';
export { loadManifest, readManifest } from './manifest/loader';
export { OutputRenderer, type VerificationResult, type CheckEntry } from './output/renderer';
