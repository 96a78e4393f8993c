/**
 * Background Jobs Module
 *
 * @module
 */

export * from "./models.js";
export { pathsOverlap } from "./path-overlap.js";
export { DocJobCoordinator, type DocJobCoordinatorOptions, type DocJobStartOptions } from "./doc-job-coordinator.js";
