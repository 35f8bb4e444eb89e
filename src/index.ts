export * from './transcript';
export { parseCliArgs, runCli } from './cli';
export type { CliIO, CliOptions } from './cli';
