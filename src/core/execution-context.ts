/**
 * Execution Context Module
 *
 * Builds the services a command runs with: directories, configuration, the
 * HTTP client and retry policy, the manifest store, the runner for external
 * programs and the host-specific environment target. Tests build the same
 * shape from fakes.
 */

import type { EspforgeConfig, EspforgeDirectories } from '../types/index.js';
import { DEFAULTS, ENV_VARS } from '../constants/index.js';
import { ConfigurationError } from '../utils/errors.js';
import { UndiciHttpClient, proxyFromEnvironment, type HttpClient } from '../utils/http-client.js';
import { logger } from '../utils/logger.js';
import { runCommand, type CommandRunner } from '../utils/process.js';
import { RetryPolicy } from '../utils/retry.js';
import { ConfigManager } from './config.js';
import { ensureEspforgeDirectories, getEspforgeDirectories } from './directory.js';
import { environmentTargetFor, type EnvironmentTarget } from './env/environment-target.js';
import type { HostTriple } from './host-triple.js';
import { ManifestStore } from './manifest/manifest-store.js';
import type { OutputPort } from './ports/output.js';
import { GitSdkInstaller, type SdkInstaller } from './sdk/sdk-installer.js';

export interface ExecutionContext {
  dirs: EspforgeDirectories;
  config: EspforgeConfig;
  output: OutputPort;
  http: HttpClient;
  retry: RetryPolicy;
  manifests: ManifestStore;
  sdkInstaller: SdkInstaller;
  /** tar, installer bundles and rustup */
  runCommand: CommandRunner;
  environmentTarget(host: HostTriple): EnvironmentTarget;
  /** Maximum number of components staged at once */
  concurrency: number;
  githubToken?: string;
  /** Export file chosen through the environment or config; a flag wins over it */
  exportFile?: string;
  signal?: AbortSignal;
}

export interface ExecutionOptions {
  output: OutputPort;
  githubToken?: string;
  concurrency?: number;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
}

export async function createExecutionContext(options: ExecutionOptions): Promise<ExecutionContext> {
  const env = options.env ?? process.env;
  const dirs = await ensureEspforgeDirectories(getEspforgeDirectories(env));
  const config = await new ConfigManager(dirs).load();

  const concurrency = options.concurrency ?? config.concurrency ?? DEFAULTS.CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigurationError(`Invalid concurrency '${concurrency}': expected a positive integer`);
  }

  const proxy = config.proxy ?? proxyFromEnvironment(env);
  const githubToken = options.githubToken || env[ENV_VARS.GITHUB_TOKEN] || config.githubToken || undefined;

  logger.debug('Created execution context', {
    home: dirs.home,
    toolchains: dirs.toolchains,
    tools: dirs.tools,
    concurrency,
    proxy: proxy ? 'configured' : 'none',
    githubToken: githubToken ? 'set' : 'unset'
  });

  return {
    dirs,
    config,
    output: options.output,
    http: new UndiciHttpClient(proxy),
    retry: new RetryPolicy(config.retry),
    manifests: new ManifestStore(dirs.manifests),
    sdkInstaller: new GitSdkInstaller(runCommand),
    runCommand,
    environmentTarget: host => environmentTargetFor(host),
    concurrency,
    githubToken,
    exportFile: env[ENV_VARS.EXPORT_FILE] || config.exportFile || undefined,
    signal: options.signal
  };
}
