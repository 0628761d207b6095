/**
 * trackforge
 *
 * Resumable three-stage media pipeline: music generation, cover image
 * generation and video composition, with classified retries, a failure
 * queue and checkpoint/resume.
 *
 * @example
 * ```typescript
 * import {
 *   DEFAULT_SETTINGS,
 *   PipelineOrchestrator,
 *   createCapabilities,
 *   createPipelineContext,
 *   loadConfig,
 * } from 'trackforge';
 *
 * const config = loadConfig();
 * const capabilities = createCapabilities({ config, settings: DEFAULT_SETTINGS });
 * const orchestrator = new PipelineOrchestrator(createPipelineContext({ dataDir: config.dataDir, capabilities }));
 * const report = await orchestrator.run();
 * ```
 *
 * @module trackforge
 */

export * from './schemas/index.js';
export * from './storage/index.js';
export * from './pipeline/index.js';
export * from './workers/index.js';
export * from './config/index.js';
export * from './reconcile/index.js';
export * from './scan/index.js';
