/**
 * livyscan — Package installation detection.
 */

import type { PackageManager } from '../types/index.js';
import { cleanToken, stripInstalledVersion } from './normalize.js';

export interface InstallMatch {
  manager: PackageManager;
  rawCommand: string;
  packages: string[];
}

// Commands may follow a shell separator, a notebook magic (%pip, !pip) or a quote
const CMD_LEAD = String.raw`(?:^|[\s;&|(!%'"\x60])`;

const PIP_COMMAND = new RegExp(
  String.raw`${CMD_LEAD}((?:(?:python3?(?:\.\d+)?|py)\s+-m\s+)?pip3?(?:\.\d+)?\s+install\b.*)$`, 'i',
);
const CONDA_COMMAND = new RegExp(String.raw`${CMD_LEAD}((conda|mamba|micromamba)\s+install\b.*)$`, 'i');

// pip's own progress output
const PIP_INSTALLED = /\bSuccessfully installed\s+(.+)$/;
const PIP_COLLECTED = /\bInstalling collected packages:\s*(.+)$/;

/** Flags whose next token is a value, not a package */
const VALUE_FLAGS = new Set([
  '-r', '--requirement', '-c', '--constraint', '-e', '--editable',
  '-i', '--index-url', '--extra-index-url', '-f', '--find-links',
  '-t', '--target', '--trusted-host', '--prefix', '-p', '--root',
  '--channel', '-n', '--name', '--platform', '--python-version',
  '--src', '--log', '--cache-dir', '--proxy', '--cert', '--client-cert',
]);

const SHELL_STOPS = new Set(['&&', '||', ';', '|', '&']);

export function matchPackageInstall(line: string): InstallMatch | null {
  let m = line.match(PIP_COMMAND);
  if (m) {
    const rawCommand = trimCommand(m[1]);
    return { manager: 'pip', rawCommand, packages: packageTokens(afterInstall(rawCommand)) };
  }

  m = line.match(CONDA_COMMAND);
  if (m) {
    const rawCommand = trimCommand(m[1]);
    const manager: PackageManager = m[2].toLowerCase() === 'conda' ? 'conda' : 'other';
    return { manager, rawCommand, packages: packageTokens(afterInstall(rawCommand)) };
  }

  m = line.match(PIP_INSTALLED);
  if (m) {
    const packages = m[1].trim().split(/\s+/).map(cleanToken).filter(Boolean).map(stripInstalledVersion);
    return { manager: 'pip', rawCommand: m[0].trim(), packages };
  }

  m = line.match(PIP_COLLECTED);
  if (m) {
    const packages = m[1].split(',').map(t => cleanToken(t.trim())).filter(Boolean);
    return { manager: 'pip', rawCommand: m[0].trim(), packages };
  }

  return null;
}

/**
 * Package tokens after the sub-command. Flags are skipped along with the
 * value of flags that take one; a shell operator ends the command.
 */
export function packageTokens(args: string): string[] {
  const packages: string[] = [];
  const tokens = args.split(/\s+/).filter(Boolean);

  for (let i = 0; i < tokens.length; i++) {
    const raw = tokens[i];
    if (SHELL_STOPS.has(raw) || raw.startsWith('>') || raw.startsWith('#') || raw.startsWith('2>')) break;

    const endsCommand = /[;&|]$/.test(raw);
    const token = cleanToken(raw.replace(/[;&|]+$/, ''));

    if (token.startsWith('-')) {
      if (VALUE_FLAGS.has(token)) i++;
    } else if (token) {
      packages.push(token);
    }
    if (endsCommand) break;
  }
  return packages;
}

function afterInstall(command: string): string {
  const idx = command.search(/\binstall\b/i);
  return idx < 0 ? '' : command.slice(idx + 'install'.length);
}

/** Cut the command at a closing quote/paren left over from source code. */
function trimCommand(command: string): string {
  return command.replace(/["'`)\s]+$/, '').trim();
}
