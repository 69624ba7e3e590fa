import { execa } from 'execa';
import type { JudgeConfig } from '../types/index.js';
import { JudgeVerdictSchema, type Judge, type JudgeRequest, type JudgeVerdict } from './types.js';

const DEFAULT_TIMEOUT_MS = 30000;

export interface CommandJudgeOptions {
  onDebug?: (message: string) => void;
}

function preview(text: string): string {
  return `${text.slice(0, 200)}${text.length > 200 ? '...' : ''}`;
}

/**
 * Parse a judge's stdout into a verdict
 * @param label The command line, for error messages
 */
export function parseVerdict(stdout: string, stderr: string, label: string): JudgeVerdict {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch {
    let errMsg = `Judge output is not valid JSON: ${label}\nStdout: ${stdout}`;
    if (stderr) {
      errMsg += `\nStderr: ${stderr}`;
    }
    throw new Error(errMsg);
  }

  const verdict = JudgeVerdictSchema.safeParse(parsed);
  if (!verdict.success) {
    const errors = verdict.error.errors
      .map((e) => `${e.path.join('.') || '(verdict)'}: ${e.message}`)
      .join('; ');
    throw new Error(`Invalid judge verdict from ${label}: ${errors}`);
  }
  return verdict.data;
}

/**
 * Judge backed by an external command.
 * The request is written to stdin as JSON; stdout must be a JSON verdict.
 */
export class CommandJudge implements Judge {
  private readonly debug: (message: string) => void;

  constructor(
    private readonly config: JudgeConfig,
    options: CommandJudgeOptions = {}
  ) {
    this.debug = options.onDebug ?? (() => {});
  }

  async evaluate(request: JudgeRequest): Promise<JudgeVerdict> {
    const [cmd, ...args] = this.config.cmd;
    const label = this.config.cmd.join(' ');
    const timeout = this.config.timeout_ms ?? DEFAULT_TIMEOUT_MS;

    this.debug(`[Judge] Running: ${label} (${request.scope})`);

    const env = this.config.env ? { ...process.env, ...this.config.env } : undefined;
    const result = await execa(cmd, args, {
      input: JSON.stringify(request),
      timeout,
      reject: true,
      env,
    });
    this.debug(`[Judge] Exit code: ${result.exitCode}`);

    const stderr = typeof result.stderr === 'string' ? result.stderr.trim() : '';
    if (stderr) {
      this.debug(`[Judge] Stderr: ${preview(stderr)}`);
    }

    const stdout = typeof result.stdout === 'string' ? result.stdout.trim() : '';
    if (!stdout) {
      throw new Error(`Judge produced no output: ${label}`);
    }
    this.debug(`[Judge] Stdout: ${preview(stdout)}`);

    return parseVerdict(stdout, stderr, label);
  }
}
