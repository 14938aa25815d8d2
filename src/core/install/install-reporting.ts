import pico from 'picocolors';
import type { OutputPort } from '../ports/output.js';
import { formatPathForDisplay, getTreeConnector } from '../../utils/formatters.js';
import type { RustTargetsOutcome } from '../toolchain/rustup.js';
import type { OperationOutcome } from './install-executor.js';

export interface InstallReportData {
  /** `install`, `update` */
  action: string;
  installationName: string;
  outcomes: OperationOutcome[];
  activationFiles: string[];
  /** Command line that activates the installation in the current shell */
  activationUsage?: string;
  riscvTargets?: RustTargetsOutcome;
}

function describeOutcome(outcome: OperationOutcome): string {
  const label = outcome.version ? `${outcome.name}@${outcome.version}` : outcome.name;
  switch (outcome.status) {
    case 'installed':
      return `${label} ${pico.dim(formatPathForDisplay(outcome.destination ?? ''))}`;
    case 'reused':
      return `${label} ${pico.dim('(unchanged)')}`;
    case 'failed':
    case 'skipped':
      return `${label}: ${outcome.error ?? outcome.status}`;
  }
}

// ============================================================================
// Helper: render a list of items with correct tree connectors
// ============================================================================

function renderTreeList(items: string[], output: OutputPort, indent: string = '  '): void {
  for (let i = 0; i < items.length; i++) {
    const connector = getTreeConnector(i === items.length - 1);
    output.info(`${indent}${connector}${items[i]}`);
  }
}

/**
 * Header line summarising outcomes, e.g. "3 of 5 components installed, 2 failed"
 */
export function summarizeOutcomes(outcomes: readonly OperationOutcome[]): string {
  const total = outcomes.length;
  const succeeded = outcomes.filter(outcome => outcome.status === 'installed' || outcome.status === 'reused').length;
  const failed = total - succeeded;
  const base = `${succeeded} of ${total} components installed`;
  return failed > 0 ? `${base}, ${failed} failed` : base;
}

export function hasFailures(outcomes: readonly OperationOutcome[], riscvTargets?: RustTargetsOutcome): boolean {
  return (
    riscvTargets?.status === 'failed' ||
    outcomes.some(outcome => outcome.status === 'failed' || outcome.status === 'skipped')
  );
}

function displayRiscvTargets(result: RustTargetsOutcome, output: OutputPort): void {
  if (result.status === 'installed') {
    output.info(`RISC-V targets on Rust ${result.toolchain}: ${result.targets.join(', ')}`);
  } else {
    output.error(`RISC-V targets on Rust ${result.toolchain} were not installed: ${result.error ?? 'unknown error'}`);
  }
}

// ============================================================================
// Main display function
// ============================================================================

export function displayInstallationResults(data: InstallReportData, output: OutputPort): void {
  const { outcomes } = data;
  const succeeded = outcomes.filter(outcome => outcome.status === 'installed' || outcome.status === 'reused');
  const problems = outcomes.filter(outcome => outcome.status === 'failed' || outcome.status === 'skipped');
  const summary = summarizeOutcomes(outcomes);

  if (problems.length === 0) {
    output.success(`${summary} (${data.action} '${data.installationName}')`);
    renderTreeList(succeeded.map(describeOutcome), output);
  } else {
    output.error(`${summary}:`);
    renderTreeList(problems.map(outcome => pico.red(describeOutcome(outcome))), output);
    if (succeeded.length > 0) {
      output.info('Completed:');
      renderTreeList(succeeded.map(describeOutcome), output);
    }
  }

  if (data.riscvTargets) {
    displayRiscvTargets(data.riscvTargets, output);
  }

  if (data.activationFiles.length > 0) {
    output.info('Activation scripts:');
    renderTreeList(data.activationFiles.map(file => formatPathForDisplay(file)), output);
  }
  if (data.activationUsage) {
    output.note(data.activationUsage, 'To configure your current shell, run');
  }
}
