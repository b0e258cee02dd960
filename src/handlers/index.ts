/**
 * Handlers exports
 */

export { runCli, EXIT_OK, EXIT_FAILURE, EXIT_CONFIGURATION, VERSION } from './cli.handler';
export type { CliDependencies, CliIO } from './cli.handler';
