/**
 * devflow-triage - classify development requests, run phased analysis
 * workflows and consolidate their findings
 *
 * @packageDocumentation
 */

// Types
export * from './types.js';

// Utils
export * from './utils/index.js';

// Classifier
export * from './classifier/index.js';

// Capabilities
export * from './capabilities/index.js';

// Workflows
export * from './workflows/index.js';
