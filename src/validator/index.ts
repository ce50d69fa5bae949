/**
 * Semantic validation in three ordered phases. Each phase reports every
 * error it finds; a later phase runs only when the earlier ones were clean.
 */
export { runPhase1 } from './phase1.js';
export { runPhase2 } from './phase2.js';
export { runPhase3, type Phase3Result } from './phase3.js';
export { Diagnostics } from './diagnostics.js';
