#!/usr/bin/env node

/**
 * livyscan CLI
 *
 * Usage:
 *   livyscan analyze [file]   Analyze session logs, print a console summary
 *   livyscan report [file]    Write a Markdown report (and optionally JSON)
 *   livyscan sarif [file]     Export findings as SARIF 2.1.0
 *   livyscan trusted          List the effective trusted domains/patterns
 *
 * [file] is a consolidated session file; when omitted the newest
 * consolidated_spark_logs_*.json in output/ or the working directory is used.
 */

import { Command, Option } from 'commander';
import { relative, resolve } from 'node:path';
import type { Report, SessionSource } from '../types/index.js';
import { VERSION } from '../types/index.js';
import { BundleFormatError, ConfigurationError, errorMessage } from '../types/errors.js';
import { loadTrustCatalog } from '../catalog/index.js';
import { resolveConfig, type ResolvedConfig } from '../config/index.js';
import { findLatestConsolidatedFile, findSessionDirectories, readConsolidatedFile } from '../bundle/index.js';
import { runPipelineAsync, type PipelineHooks } from '../pipeline/index.js';
import { formatTextSummary, generateMarkdownReport, serializeReport, sessionTitle } from '../report/index.js';
import { generateSarif, type SarifLevel } from '../analyzer/index.js';
import { C, banner, header } from './format.js';
import { formatConsoleSummary } from './summary.js';
import { resolveExportPath, writeOutput } from './output.js';

const program = new Command();

program
  .name('livyscan')
  .description('Audit notebook session logs for external connections, package installs and logging changes.')
  .version(VERSION)
  .addHelpText('before', banner());

// ─── Shared input handling ───────────────────────────────────────────

interface InputOptions {
  dir?: string;
  externalOnly?: boolean;
  trustedDomain?: string[];
  /** Commander sets this false for --no-default-domains */
  defaultDomains?: boolean;
  concurrency?: number;
  quiet?: boolean;
}

function withInputOptions(cmd: Command): Command {
  return cmd
    .argument('[file]', 'Consolidated session file (auto-detected when omitted)')
    .option('-d, --dir <path>', 'Scan session directories (log_summary.json) below <path> instead')
    .option('--external-only', 'Only list sessions with external connections')
    .option('-t, --trusted-domain <pattern...>', 'Additional trusted domain/pattern (repeatable)')
    .option('--no-default-domains', 'Do not include the built-in trusted domains')
    .addOption(new Option('-c, --concurrency <n>', 'Sessions processed at once').argParser(v => Number(v)))
    .option('-q, --quiet', 'Suppress progress output');
}

function configFrom(opts: InputOptions): ResolvedConfig {
  return resolveConfig(process.cwd(), {
    trustedDomains: opts.trustedDomain,
    useDefaultDomains: opts.defaultDomains === false ? false : undefined,
    concurrency: opts.concurrency,
  });
}

async function loadSources(file: string | undefined, opts: InputOptions, config: ResolvedConfig): Promise<SessionSource[] | null> {
  if (opts.dir) {
    const root = resolve(opts.dir);
    const sources = await findSessionDirectories(root);
    if (sources.length === 0) {
      console.error(C.error(`No log_summary.json found below ${opts.dir}`));
      return null;
    }
    if (!opts.quiet) console.error(C.info(`Found ${sources.length} session director${sources.length === 1 ? 'y' : 'ies'} below ${opts.dir}`));
    return sources;
  }

  let path = file;
  if (!path) {
    path = await findLatestConsolidatedFile([config.outputDir, '.']);
    if (!path) {
      console.error(C.error('No consolidated file found. Pass a path or run the log collector first.'));
      console.error(C.dim('Expected file pattern: consolidated_spark_logs_YYYYMMDD_HHMMSS.json'));
      return null;
    }
    if (!opts.quiet) console.error(C.info(`Auto-detected consolidated file: ${relative(process.cwd(), path)}`));
  }

  const sources = await readConsolidatedFile(path);
  if (!opts.quiet) console.error(C.info(`Found ${sources.length} session(s) to analyze`));
  return sources;
}

async function analyzeInput(file: string | undefined, opts: InputOptions): Promise<{ report: Report; config: ResolvedConfig } | null> {
  const config = configFrom(opts);
  const catalog = loadTrustCatalog(config.trustedDomains);
  if (!opts.quiet && config.sources.length > 0) {
    console.error(C.dim(`Config: ${config.sources.join(', ')}`));
  }

  const sources = await loadSources(file, opts, config);
  if (!sources) return null;

  let done = 0;
  const hooks: PipelineHooks = {
    onSessionComplete: profile => {
      done++;
      if (opts.quiet) return;
      const mark = profile.hasExternalActivity ? C.external('!') : C.success('✓');
      console.error(`  ${mark} [${done}/${sources.length}] ${sessionTitle(profile)}`);
    },
    onSessionFailed: (sessionId, err) => {
      done++;
      console.error(C.warn(`  ✗ [${done}/${sources.length}] ${sessionId}: ${errorMessage(err)}`));
    },
  };

  const report = await runPipelineAsync(sources, catalog, {
    externalOnly: opts.externalOnly === true,
    concurrency: config.concurrency,
    hooks,
  });
  return { report, config };
}

/** Known input problems print in red and exit 1; anything else is a bug and propagates. */
function guarded<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (err) {
      if (err instanceof ConfigurationError || err instanceof BundleFormatError) {
        console.error(C.error(`✗ ${err.message}`));
        process.exitCode = 1;
        return;
      }
      throw err;
    }
  };
}

// ─── analyze ─────────────────────────────────────────────────────────

withInputOptions(
  program
    .command('analyze')
    .description('Analyze session logs and print a security summary'),
)
  .option('--connections-only', 'Only list sessions with any outbound connection')
  .option('--export-summary <file>', 'Write the text summary to <file>')
  .option('--export-json <file>', 'Write the full report as JSON to <file>')
  .action(guarded(async (file: string | undefined, opts: InputOptions & { connectionsOnly?: boolean; exportSummary?: string; exportJson?: string }) => {
    const result = await analyzeInput(file, opts);
    if (!result) {
      process.exitCode = 1;
      return;
    }
    const { report, config } = result;

    const mode = opts.externalOnly ? 'external' : opts.connectionsOnly ? 'connections' : 'all';
    console.log(formatConsoleSummary(report, mode).join('\n'));

    if (opts.exportSummary) {
      const out = resolveExportPath(opts.exportSummary, config.outputDir);
      await writeOutput(out, formatTextSummary(report));
      console.error(C.success(`✓ Wrote summary to ${relative(process.cwd(), out)}`));
    }
    if (opts.exportJson) {
      const out = resolveExportPath(opts.exportJson, config.outputDir);
      await writeOutput(out, serializeReport(report));
      console.error(C.success(`✓ Wrote JSON report to ${relative(process.cwd(), out)}`));
    }
  }));

// ─── report ──────────────────────────────────────────────────────────

withInputOptions(
  program
    .command('report')
    .description('Generate a Markdown report with a diagram of external contacts'),
)
  .option('-o, --output <file>', 'Output file', 'livyscan-report.md')
  .option('--json', 'Also write the report as JSON beside the Markdown file')
  .action(guarded(async (file: string | undefined, opts: InputOptions & { output: string; json?: boolean }) => {
    const result = await analyzeInput(file, opts);
    if (!result) {
      process.exitCode = 1;
      return;
    }
    const { report, config } = result;

    const out = resolveExportPath(opts.output, config.outputDir);
    await writeOutput(out, generateMarkdownReport(report));
    console.error(C.success(`✓ Wrote report to ${relative(process.cwd(), out)}`));

    if (opts.json) {
      const jsonFile = out.replace(/\.md$/, '') + '.json';
      await writeOutput(jsonFile, serializeReport(report));
      console.error(C.success(`✓ Wrote JSON report to ${relative(process.cwd(), jsonFile)}`));
    }
  }));

// ─── sarif ───────────────────────────────────────────────────────────

withInputOptions(
  program
    .command('sarif')
    .description('Export findings as SARIF 2.1.0 for code scanning dashboards'),
)
  .option('-o, --output <file>', 'Write SARIF to file (default: stdout)')
  .addOption(new Option('--min-level <level>', 'Drop results below this level').choices(['error', 'warning', 'note']))
  .action(guarded(async (file: string | undefined, opts: InputOptions & { output?: string; minLevel?: SarifLevel }) => {
    const result = await analyzeInput(file, { ...opts, quiet: opts.quiet || !opts.output });
    if (!result) {
      process.exitCode = 1;
      return;
    }
    const { report, config } = result;

    const sarif = generateSarif(report, { minLevel: opts.minLevel });
    const json = JSON.stringify(sarif, null, 2);

    if (opts.output) {
      const out = resolveExportPath(opts.output, config.outputDir);
      await writeOutput(out, json + '\n');
      console.error(C.success(`✓ Wrote SARIF to ${relative(process.cwd(), out)}`));
    } else {
      console.log(json);
    }

    const results = sarif.runs[0]?.results ?? [];
    const errors = results.filter(r => r.level === 'error').length;
    const warnings = results.filter(r => r.level === 'warning').length;
    console.error(`SARIF: ${results.length} result(s), ${errors} error(s), ${warnings} warning(s)`);
  }));

// ─── trusted ─────────────────────────────────────────────────────────

program
  .command('trusted')
  .description('List the effective trusted domains/patterns')
  .option('-t, --trusted-domain <pattern...>', 'Additional trusted domain/pattern (repeatable)')
  .option('--no-default-domains', 'Do not include the built-in trusted domains')
  .action(guarded(async (opts: Pick<InputOptions, 'trustedDomain' | 'defaultDomains'>) => {
    const config = configFrom(opts);
    const catalog = loadTrustCatalog(config.trustedDomains);
    console.log(header('CONFIGURED TRUSTED DOMAINS/PATTERNS', 50).join('\n'));
    catalog.patterns.forEach((pattern, i) => {
      console.log(`${String(i + 1).padStart(2)}. ${pattern}`);
    });
    console.log(`\nTotal: ${catalog.size} trusted domains/patterns`);
  }));

await program.parseAsync();
