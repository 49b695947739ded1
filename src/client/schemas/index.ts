/**
 * schemas/index.ts — Re-exports the response schemas the core parses itself.
 *
 * Resource schemas (machines, subnets, …) live with the code that calls them.
 */

export { VersionInfoSchema } from './version.js';
export type { VersionInfo } from './version.js';
