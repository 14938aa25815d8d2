/**
 * Shell completion scripts generated from the commander command tree, so they
 * never drift from the options a command actually accepts.
 */

import type { Command } from 'commander';
import { ConfigurationError } from '../utils/errors.js';

export const COMPLETION_SHELLS = ['bash', 'zsh', 'fish', 'powershell'] as const;
export type CompletionShell = typeof COMPLETION_SHELLS[number];

export interface CompletionOption {
  short?: string;
  long?: string;
  description: string;
  takesValue: boolean;
}

export interface CompletionCommand {
  name: string;
  description: string;
  options: CompletionOption[];
  /** Fixed values accepted by positional arguments */
  values: string[];
}

export interface CompletionTree {
  program: string;
  commands: CompletionCommand[];
}

const HELP_OPTION: CompletionOption = { short: '-h', long: '--help', description: 'display help for command', takesValue: false };

export function isCompletionShell(value: string): value is CompletionShell {
  return COMPLETION_SHELLS.some(shell => shell === value);
}

export function describeCommandTree(program: Command): CompletionTree {
  return {
    program: program.name(),
    commands: program.commands.map(command => ({
      name: command.name(),
      description: command.description(),
      options: [
        ...command.options.map(option => ({
          short: option.short,
          long: option.long,
          description: option.description,
          takesValue: option.required || option.optional
        })),
        HELP_OPTION
      ],
      values: command.registeredArguments.flatMap(argument => argument.argChoices ?? [])
    }))
  };
}

function flagsOf(option: CompletionOption): string[] {
  return [option.short, option.long].filter((flag): flag is string => Boolean(flag));
}

function functionName(program: string): string {
  return `_${program.replace(/[^A-Za-z0-9_]/g, '_')}`;
}

function singleQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function bashCompletion(tree: CompletionTree): string {
  const fn = functionName(tree.program);
  const lines = [
    `${fn}() {`,
    '    local cur="${COMP_WORDS[COMP_CWORD]}"',
    `    local commands=${singleQuote(tree.commands.map(command => command.name).join(' '))}`,
    '    if [ "$COMP_CWORD" -eq 1 ]; then',
    '        COMPREPLY=($(compgen -W "$commands" -- "$cur"))',
    '        return 0',
    '    fi',
    '    case "${COMP_WORDS[1]}" in'
  ];
  for (const command of tree.commands) {
    const words = [...command.options.flatMap(flagsOf), ...command.values].join(' ');
    lines.push(`        ${command.name})`);
    lines.push(`            COMPREPLY=($(compgen -W ${singleQuote(words)} -- "$cur"))`);
    lines.push('            ;;');
  }
  lines.push('    esac', '}', `complete -F ${fn} ${tree.program}`, '');
  return lines.join('\n');
}

function zshDescription(text: string): string {
  return text.replace(/[[\]:']/g, match => (match === "'" ? `'\\''` : `\\${match}`));
}

export function zshCompletion(tree: CompletionTree): string {
  const fn = functionName(tree.program);
  const lines = [
    `#compdef ${tree.program}`,
    '',
    `${fn}() {`,
    '    local -a commands',
    '    commands=('
  ];
  for (const command of tree.commands) {
    lines.push(`        '${command.name}:${zshDescription(command.description)}'`);
  }
  lines.push('    )', '    if (( CURRENT == 2 )); then', "        _describe 'command' commands", '        return', '    fi');
  lines.push('    case "$words[2]" in');
  for (const command of tree.commands) {
    lines.push(`        ${command.name})`);
    const specs: string[] = [];
    for (const option of command.options) {
      const description = zshDescription(option.description);
      for (const flag of flagsOf(option)) {
        specs.push(`'${flag}[${description}]${option.takesValue ? ':value:' : ''}'`);
      }
    }
    if (command.values.length > 0) {
      specs.push(`'1:value:(${command.values.join(' ')})'`);
    }
    lines.push(`            _arguments ${specs.join(' ')}`);
    lines.push('            ;;');
  }
  lines.push('    esac', '}', '', `${fn} "$@"`, '');
  return lines.join('\n');
}

export function fishCompletion(tree: CompletionTree): string {
  const lines = [`complete -c ${tree.program} -f`];
  for (const command of tree.commands) {
    lines.push(
      `complete -c ${tree.program} -n '__fish_use_subcommand' -a ${command.name} -d ${singleQuote(command.description)}`
    );
  }
  for (const command of tree.commands) {
    const condition = `'__fish_seen_subcommand_from ${command.name}'`;
    for (const option of command.options) {
      const parts = [`complete -c ${tree.program} -n ${condition}`];
      if (option.short) parts.push(`-s ${option.short.slice(1)}`);
      if (option.long) parts.push(`-l ${option.long.slice(2)}`);
      if (option.takesValue) parts.push('-r');
      parts.push(`-d ${singleQuote(option.description)}`);
      lines.push(parts.join(' '));
    }
    if (command.values.length > 0) {
      lines.push(`complete -c ${tree.program} -n ${condition} -a ${singleQuote(command.values.join(' '))}`);
    }
  }
  lines.push('');
  return lines.join('\n');
}

function powershellString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function powershellCompletion(tree: CompletionTree): string {
  const lines = [
    `Register-ArgumentCompleter -Native -CommandName ${powershellString(tree.program)} -ScriptBlock {`,
    '    param($wordToComplete, $commandAst, $cursorPosition)',
    '    $commands = @{'
  ];
  for (const command of tree.commands) {
    const words = [...command.options.flatMap(flagsOf), ...command.values].map(powershellString).join(', ');
    lines.push(`        ${powershellString(command.name)} = @(${words})`);
  }
  lines.push(
    '    }',
    '    $elements = @($commandAst.CommandElements | ForEach-Object { $_.ToString() })',
    '    if ($elements.Count -lt 2 -or ($elements.Count -eq 2 -and $wordToComplete)) {',
    '        $candidates = $commands.Keys',
    '    } else {',
    '        $candidates = $commands[$elements[1]]',
    '    }',
    '    $candidates | Where-Object { $_ -like "$wordToComplete*" } | Sort-Object | ForEach-Object {',
    "        [System.Management.Automation.CompletionResult]::new($_, $_, 'ParameterValue', $_)",
    '    }',
    '}',
    ''
  );
  return lines.join('\r\n');
}

export function generateCompletions(program: Command, shell: string): string {
  if (!isCompletionShell(shell)) {
    throw new ConfigurationError(`Unsupported shell '${shell}'. Supported shells: ${COMPLETION_SHELLS.join(', ')}`);
  }
  const tree = describeCommandTree(program);
  switch (shell) {
    case 'bash':
      return bashCompletion(tree);
    case 'zsh':
      return zshCompletion(tree);
    case 'fish':
      return fishCompletion(tree);
    case 'powershell':
      return powershellCompletion(tree);
  }
}
