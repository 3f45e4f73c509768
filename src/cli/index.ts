/**
 * CLI Module
 */

export {
  USAGE_ERROR_STATUS,
  createProgram,
  runCli,
  type CliDependencies,
} from './cli';
