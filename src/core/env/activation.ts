/**
 * Activation synthesis: which PATH entries and variables an installation
 * needs, and the shell scripts that apply them.
 *
 * Every script checks whether a PATH entry is already present before
 * prepending it, so sourcing a script twice leaves PATH unchanged.
 */

import { posix, win32 } from 'path';
import type { ActivationArtifact, ActivationPlan, Manifest, ShellDialect } from '../../types/index.js';
import { isWindowsHost } from '../host-triple.js';

export const DIALECT_EXTENSIONS: Readonly<Record<ShellDialect, string>> = {
  posix: '.sh',
  fish: '.fish',
  powershell: '.ps1',
  cmd: '.bat'
};

const ALL_DIALECTS: readonly ShellDialect[] = ['posix', 'fish', 'powershell', 'cmd'];

/**
 * PATH entries and variables for everything recorded in the manifest
 */
export function activationPlan(manifest: Manifest): ActivationPlan {
  const windows = isWindowsHost(manifest.host);
  const paths = windows ? win32 : posix;
  const pathEntries: string[] = [];
  const variables: Record<string, string> = {};

  const addPath = (entry: string): void => {
    if (!pathEntries.includes(entry)) pathEntries.push(entry);
  };

  for (const component of manifest.components) {
    switch (component.kind) {
      case 'cross-compiler':
        addPath(paths.join(component.path, component.name, 'bin'));
        break;
      case 'support-library': {
        const clangRoot = paths.join(component.path, 'esp-clang');
        const libclang = paths.join(clangRoot, windows ? 'bin' : 'lib');
        variables.LIBCLANG_PATH = libclang;
        if (windows) {
          addPath(libclang);
        }
        if (manifest.options.extendedLlvm) {
          variables.CLANG_PATH = paths.join(clangRoot, 'bin', windows ? 'clang.exe' : 'clang');
        }
        break;
      }
      case 'sdk':
        variables.IDF_PATH = component.path;
        variables.IDF_TOOLS_PATH = manifest.paths.tools;
        break;
      case 'toolchain':
        break;
    }
  }

  return { pathEntries, variables };
}

/**
 * Apply a plan to a PATH value: entries not yet present are put in front,
 * keeping plan order; entries already present stay where they are.
 */
export function applyActivation(plan: ActivationPlan, pathValue: string, separator: string = posix.delimiter): string {
  const existing = pathValue.split(separator).filter(entry => entry.length > 0);
  const missing = plan.pathEntries.filter(entry => !existing.includes(entry));
  return [...missing, ...existing].join(separator);
}

function sortedVariables(plan: ActivationPlan): Array<[string, string]> {
  return Object.entries(plan.variables).sort(([a], [b]) => a.localeCompare(b));
}

export function quotePosix(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function quoteFish(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

export function quotePowershell(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function escapeCmd(value: string): string {
  return value.replace(/%/g, '%%');
}

// Entries are prepended in reverse so the first plan entry ends up first on PATH

function renderPosix(plan: ActivationPlan): string {
  const lines = ['#!/bin/sh', '# Generated by espforge. Source this file to activate the installation.'];
  for (const entry of [...plan.pathEntries].reverse()) {
    const quoted = quotePosix(entry);
    lines.push(
      `case ":\${PATH}:" in`,
      `  *:${quoted}:*) ;;`,
      `  *) export PATH=${quoted}:"$PATH" ;;`,
      'esac'
    );
  }
  for (const [name, value] of sortedVariables(plan)) {
    lines.push(`export ${name}=${quotePosix(value)}`);
  }
  return `${lines.join('\n')}\n`;
}

function renderFish(plan: ActivationPlan): string {
  const lines = ['# Generated by espforge. Source this file to activate the installation.'];
  for (const entry of [...plan.pathEntries].reverse()) {
    const quoted = quoteFish(entry);
    lines.push(`if not contains -- ${quoted} $PATH`, `    set -gx PATH ${quoted} $PATH`, 'end');
  }
  for (const [name, value] of sortedVariables(plan)) {
    lines.push(`set -gx ${name} ${quoteFish(value)}`);
  }
  return `${lines.join('\n')}\n`;
}

function renderPowershell(plan: ActivationPlan): string {
  const lines = ['# Generated by espforge. Dot-source this file to activate the installation.'];
  for (const entry of [...plan.pathEntries].reverse()) {
    const quoted = quotePowershell(entry);
    lines.push(
      `if (-not (($env:PATH -split ';') -contains ${quoted})) {`,
      `    $env:PATH = ${quotePowershell(`${entry};`)} + $env:PATH`,
      '}'
    );
  }
  for (const [name, value] of sortedVariables(plan)) {
    lines.push(`$env:${name} = ${quotePowershell(value)}`);
  }
  return `${lines.join('\r\n')}\r\n`;
}

function renderCmd(plan: ActivationPlan): string {
  const lines = ['@echo off', 'rem Generated by espforge. Run this file to activate the installation.'];
  for (const entry of [...plan.pathEntries].reverse()) {
    const escaped = escapeCmd(entry);
    lines.push(`echo ;%PATH%; | find /I ";${escaped};" >nul || set "PATH=${escaped};%PATH%"`);
  }
  for (const [name, value] of sortedVariables(plan)) {
    lines.push(`set "${name}=${escapeCmd(value)}"`);
  }
  return `${lines.join('\r\n')}\r\n`;
}

export function renderActivation(plan: ActivationPlan, dialect: ShellDialect): ActivationArtifact {
  let content: string;
  switch (dialect) {
    case 'posix':
      content = renderPosix(plan);
      break;
    case 'fish':
      content = renderFish(plan);
      break;
    case 'powershell':
      content = renderPowershell(plan);
      break;
    case 'cmd':
      content = renderCmd(plan);
      break;
  }
  return { dialect, extension: DIALECT_EXTENSIONS[dialect], content };
}

/**
 * Activation scripts for every supported shell dialect
 */
export function synthesizeActivation(
  manifest: Manifest,
  dialects: readonly ShellDialect[] = ALL_DIALECTS
): ActivationArtifact[] {
  const plan = activationPlan(manifest);
  return dialects.map(dialect => renderActivation(plan, dialect));
}
