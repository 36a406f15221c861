/**
 * CLI module.
 */

export {
  type CliOptions,
  type CliProgramContext,
  createCliProgram,
  resolveCliOverrides,
  type ServeRequest,
} from './program.js';
export { type CliRuntime, createNodeRuntime } from './runtime.js';
