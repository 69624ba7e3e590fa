import { dirname, resolve } from 'node:path';
import { Command } from 'commander';
import pc from 'picocolors';
import {
  loadConfig,
  loadSuiteFile,
  findSuiteFiles,
  DEFAULT_SUITE_PATTERNS,
  type LoadConfigResult,
  type LoadSuiteResult,
} from '../../config/index.js';
import { createRegistry } from '../../assertions/index.js';
import { CommandJudge } from '../../judge/index.js';
import { loadTranscript } from '../../transcript/index.js';
import { runSuite, type SuiteResult } from '../../runner/index.js';

export interface CheckOptions {
  config?: string;
  transcript?: string;
  verbose?: boolean;
  debug?: boolean;
  dryRun?: boolean;
  json?: boolean;
  failFast?: boolean;
}

interface SuiteReport {
  name: string;
  file: string;
  passed: boolean;
  error?: string;
  failures: string[];
  outcomes?: SuiteResult['outcomes'];
  cost?: SuiteResult['cost'];
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * The -t flag wins; otherwise the suite's own transcript path, relative to the suite file
 */
function transcriptPathFor(loaded: LoadSuiteResult, override: string | undefined): string {
  if (override) {
    return resolve(process.cwd(), override);
  }
  if (!loaded.suite.transcript) {
    throw new Error(`No transcript for suite "${loaded.suite.name}": set "transcript" or pass --transcript`);
  }
  return resolve(dirname(loaded.filePath), loaded.suite.transcript);
}

export const checkCommand = new Command('check')
  .description('Check suite files against recorded transcripts')
  .argument('[patterns...]', 'Suite file patterns (glob)')
  .option('-c, --config <path>', 'Path to config file')
  .option('-t, --transcript <path>', 'Transcript to check every suite against')
  .option('-v, --verbose', 'Verbose output')
  .option('--debug', 'Debug output (per-assertion and judge logs)')
  .option('-d, --dry-run', 'Validate suites without checking transcripts')
  .option('--json', 'Output results as JSON')
  .option('--fail-fast', 'Stop a suite at its first failing turn')
  .action(async (patterns: string[], options: CheckOptions) => {
    const verbose = options.verbose ?? false;
    const debugMode = options.debug ?? false;
    const jsonOutput = options.json ?? false;

    // Helper for conditional console output (suppressed in JSON mode)
    const log = jsonOutput ? () => {} : console.log;
    const logError = jsonOutput ? () => {} : console.error;
    const debug = debugMode && !jsonOutput ? (msg: string) => log(pc.dim(msg)) : undefined;

    const fatal = (prefix: string, err: unknown): never => {
      if (jsonOutput) {
        console.log(JSON.stringify({ error: errorMessage(err) }, null, 2));
      } else {
        logError(pc.red(prefix), errorMessage(err));
      }
      process.exit(1);
    };

    // Load project config
    if (verbose) {
      log(pc.dim('Loading config...'));
    }

    let configResult: LoadConfigResult;
    try {
      configResult = loadConfig({ configPath: options.config });
    } catch (err) {
      return fatal('Error:', err);
    }

    if (verbose) {
      log(pc.dim(`Config: ${configResult.configPath ?? '(none, using defaults)'}`));
      log(pc.dim(`Judge: ${configResult.config.judge?.cmd.join(' ') ?? '(not configured)'}`));
    }

    // Find suite files
    const suitePatterns = patterns.length > 0 ? patterns : DEFAULT_SUITE_PATTERNS;
    const cwd = process.cwd();

    if (verbose) {
      log(pc.dim(`Finding suites with patterns: ${suitePatterns.join(', ')}`));
    }

    let suiteFiles: string[];
    try {
      suiteFiles = await findSuiteFiles(suitePatterns, cwd);
    } catch (err) {
      return fatal('Error finding suite files:', err);
    }

    if (suiteFiles.length === 0) {
      if (jsonOutput) {
        console.log(JSON.stringify({ suites: [], passed: 0, failed: 0 }, null, 2));
      } else {
        log(pc.yellow('No suite files found.'));
      }
      process.exit(0);
    }

    log(pc.cyan(`Found ${suiteFiles.length} suite file(s)\n`));

    // Load and validate each suite file
    let hasErrors = false;
    const suites: LoadSuiteResult[] = [];

    for (const filePath of suiteFiles) {
      try {
        const loaded = loadSuiteFile(filePath);
        suites.push(loaded);
        if (verbose) {
          const turnCount = loaded.suite.turns.length;
          log(pc.green('  ✓'), pc.dim(filePath), pc.dim(`(${turnCount} turn block(s))`));
        }
      } catch (err) {
        hasErrors = true;
        logError(pc.red('  ✗'), filePath);
        logError(pc.red('   '), errorMessage(err));
      }
    }

    if (hasErrors) {
      logError(pc.red('\nSome suite files failed validation.'));
      process.exit(1);
    }

    // Dry run mode - just validate
    if (options.dryRun) {
      if (jsonOutput) {
        console.log(JSON.stringify({
          validated: suites.map((s) => ({ name: s.suite.name, file: s.filePath })),
        }, null, 2));
      } else {
        log(pc.green(`\n✓ Validated ${suites.length} suite(s)`));
        for (const { suite, filePath } of suites) {
          log(`  - ${suite.name} (${filePath})`);
        }
      }
      process.exit(0);
    }

    const { config } = configResult;
    const judge = config.judge ? new CommandJudge(config.judge, { onDebug: debug }) : undefined;
    const registry = createRegistry({ judge });

    // Check suites
    log('');
    const reports: SuiteReport[] = [];
    let passed = 0;
    let failed = 0;

    for (const loaded of suites) {
      const { suite, filePath } = loaded;
      log(pc.cyan(`Checking: ${suite.name}`));
      if (verbose) {
        log(pc.dim(`  File: ${filePath}`));
      }

      try {
        const transcriptPath = transcriptPathFor(loaded, options.transcript);
        debug?.(`[Transcript] Loading: ${transcriptPath}`);
        const transcript = await loadTranscript(transcriptPath);

        const result = await runSuite({
          suite,
          transcript,
          registry,
          defaults: config,
          verbose: verbose && !jsonOutput,
          failFast: options.failFast ?? false,
          onLog: (msg) => log(pc.dim(msg)),
          onDebug: debug,
        });

        reports.push({
          name: suite.name,
          file: filePath,
          passed: result.passed,
          error: result.error,
          failures: result.failures,
          outcomes: result.outcomes,
          cost: result.cost,
        });

        if (result.passed) {
          passed++;
          const skipped = result.outcomes.filter((o) => o.skipped).length;
          log(
            pc.green(`  ✓ PASS`),
            pc.dim(`(${result.outcomes.length} assertion(s)${skipped > 0 ? `, ${skipped} skipped` : ''})`)
          );
        } else {
          failed++;
          log(pc.red(`  ✗ FAIL`));
          if (result.error) {
            log(pc.red(`    ${result.error}`));
          }
          for (const failure of result.failures) {
            log(pc.red(`    - ${failure}`));
          }
        }
      } catch (err) {
        failed++;
        reports.push({
          name: suite.name,
          file: filePath,
          passed: false,
          error: errorMessage(err),
          failures: [errorMessage(err)],
        });
        log(pc.red(`  ✗ ERROR: ${errorMessage(err)}`));
      }
      log('');
    }

    // Output results
    if (jsonOutput) {
      console.log(JSON.stringify({
        suites: reports.map((r) => ({
          ...r,
          failures: r.failures.length > 0 ? r.failures : undefined,
        })),
        passed,
        failed,
        total: passed + failed,
      }, null, 2));
    } else {
      // Summary
      log(pc.bold('─'.repeat(40)));
      log(
        pc.bold('Results:'),
        pc.green(`${passed} passed`),
        failed > 0 ? pc.red(`${failed} failed`) : pc.dim('0 failed')
      );
    }

    process.exit(failed > 0 ? 1 : 0);
  });
