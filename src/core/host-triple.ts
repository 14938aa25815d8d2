import { ConfigurationError } from '../utils/errors.js';

export const HOST_TRIPLES = [
  'x86_64-unknown-linux-gnu',
  'aarch64-unknown-linux-gnu',
  'x86_64-pc-windows-msvc',
  'x86_64-pc-windows-gnu',
  'x86_64-apple-darwin',
  'aarch64-apple-darwin'
] as const;

export type HostTriple = typeof HOST_TRIPLES[number];

export function isHostTriple(value: string): value is HostTriple {
  return HOST_TRIPLES.some(triple => triple === value);
}

export function isWindowsHost(host: HostTriple): boolean {
  return host.includes('-windows-');
}

/**
 * Architecture segment used in Espressif's GCC and LLVM asset names
 */
export function espressifArch(host: HostTriple): string {
  switch (host) {
    case 'x86_64-unknown-linux-gnu':
      return 'x86_64-linux-gnu';
    case 'aarch64-unknown-linux-gnu':
      return 'aarch64-linux-gnu';
    case 'x86_64-pc-windows-msvc':
    case 'x86_64-pc-windows-gnu':
      return 'x86_64-w64-mingw32';
    case 'x86_64-apple-darwin':
      return 'x86_64-apple-darwin';
    case 'aarch64-apple-darwin':
      return 'aarch64-apple-darwin';
  }
}

/**
 * Resolve the host triple from an explicit override or the running platform.
 */
export function detectHostTriple(
  override?: string,
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch
): HostTriple {
  if (override) {
    if (!isHostTriple(override)) {
      throw new ConfigurationError(`Host triple '${override}' is not supported. Supported: ${HOST_TRIPLES.join(', ')}`);
    }
    return override;
  }

  const cpu = arch === 'x64' ? 'x86_64' : arch === 'arm64' ? 'aarch64' : arch;
  let candidate: string;
  switch (platform) {
    case 'linux':
      candidate = `${cpu}-unknown-linux-gnu`;
      break;
    case 'darwin':
      candidate = `${cpu}-apple-darwin`;
      break;
    case 'win32':
      candidate = `${cpu}-pc-windows-msvc`;
      break;
    default:
      candidate = `${cpu}-${platform}`;
  }

  if (!isHostTriple(candidate)) {
    throw new ConfigurationError(`Unsupported host platform ${platform}/${arch}. Pass --default-host to override.`);
  }
  return candidate;
}
