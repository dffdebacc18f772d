export { createProgram, rankFile, buildPipelineOptions } from './cli';
export type { CliOutput, RankOptions } from './cli';
