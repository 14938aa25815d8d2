import { ConfigurationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const TARGETS = [
  'esp32',
  'esp32s2',
  'esp32s3',
  'esp32c2',
  'esp32c3',
  'esp32c6',
  'esp32h2',
  'esp32p4'
] as const;

export type Target = typeof TARGETS[number];

export type Architecture = 'xtensa' | 'riscv';

const XTENSA_TARGETS: ReadonlySet<Target> = new Set<Target>(['esp32', 'esp32s2', 'esp32s3']);

export const RISCV_CROSS_COMPILER = 'riscv32-esp-elf';

export function isTarget(value: string): value is Target {
  return TARGETS.some(target => target === value);
}

export function architectureOf(target: Target): Architecture {
  return XTENSA_TARGETS.has(target) ? 'xtensa' : 'riscv';
}

/**
 * Cross-compiler package name for a target. Every RISC-V chip shares one.
 */
export function crossCompilerFor(target: Target): string {
  return architectureOf(target) === 'xtensa' ? `xtensa-${target}-elf` : RISCV_CROSS_COMPILER;
}

/**
 * Distinct cross-compilers needed by a set of targets, in target order
 */
export function crossCompilersFor(targets: readonly Target[]): string[] {
  const names: string[] = [];
  for (const target of sortTargets(targets)) {
    const name = crossCompilerFor(target);
    if (!names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

export function sortTargets(targets: readonly Target[]): Target[] {
  return [...new Set(targets)].sort((a, b) => TARGETS.indexOf(a) - TARGETS.indexOf(b));
}

export function isAllTargets(targets: readonly Target[]): boolean {
  const unique = new Set(targets);
  return TARGETS.every(target => unique.has(target));
}

/**
 * Parse a comma or space separated target list. `all` selects every known target.
 */
export function parseTargets(input: string | readonly string[]): Target[] {
  const tokens = (typeof input === 'string' ? [input] : input)
    .flatMap(value => value.split(/[\s,]+/))
    .map(value => value.trim().toLowerCase())
    .filter(value => value.length > 0);

  if (tokens.length === 0) {
    throw new ConfigurationError('No targets given');
  }

  if (tokens.includes('all')) {
    return [...TARGETS];
  }

  const targets: Target[] = [];
  for (const token of tokens) {
    if (!isTarget(token)) {
      throw new ConfigurationError(`Target '${token}' is not supported. Supported targets: all, ${TARGETS.join(', ')}`);
    }
    targets.push(token);
  }

  const parsed = sortTargets(targets);
  logger.debug(`Parsed targets: ${parsed.join(', ')}`);
  return parsed;
}
