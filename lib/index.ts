export { Runner, DEFAULT_RUNNER_CONFIG, validateRunnerConfig } from './runner';
export type { RunnerConfig } from './runner';
export { PostProcessor, cleanName, isRootOrSubdomain, isStrictSubdomain } from './postProcessor';
export type { FilterPolicy } from './postProcessor';
export { writeResults } from './output';
export type { OutputOptions } from './output';
export { channel, Sender, Receiver } from './net/channel';
export { HttpClient, HttpStatusError } from './net/httpClient';
export { createRegistry, listSources, fetchSource, toBatch } from './sources';
export { envCredentials, staticCredentials } from './credentials';
export { normalizeDomain, isValidHost, toRootSet } from './subdomain';
export * from './errors';
export type * from './types';
