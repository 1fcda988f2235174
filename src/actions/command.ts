import { spawn } from 'node:child_process';
import { StringDecoder } from 'node:string_decoder';
import type { StepAction, StepResult } from '../sequencer/types.js';
import { debug } from '../lib/utils/debug.js';

/** Characters of stderr kept for a failure's detail */
export const STDERR_TAIL_CHARS = 500;

export interface CommandActionOptions {
  cmd: string;
  cwd: string;
  env?: Record<string, string>;
  /** Where the child's stdout is mirrored; null discards it */
  stdout?: NodeJS.WritableStream | null;
  /** Where the child's stderr is mirrored; null discards it */
  stderr?: NodeJS.WritableStream | null;
}

// ── Secret masking ──

export function maskSecrets(text: string): string {
  return text
    .replace(/(?:sk-|pk-|token_)[a-zA-Z0-9]{20,}/g, '***')
    .replace(/(Bearer|Basic)\s+\S{20,}/g, (_m, scheme: string) => `${scheme} ***`)
    .replace(/(?:password|secret|key|token)=\S+/gi, (m) => m.split('=')[0] + '=***');
}

// ── Shell command execution ──

/**
 * Run a shell command to completion.
 * Exit 0 is success; anything else is a failure carrying the stderr tail.
 */
export function runCommand(options: CommandActionOptions): Promise<StepResult> {
  const { stdout = process.stdout, stderr = process.stderr } = options;

  return new Promise((resolve) => {
    let settled = false;
    const settle = (result: StepResult): void => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    debug('actions:command', `$ ${options.cmd} (cwd: ${options.cwd})`);
    const child = spawn(options.cmd, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      shell: true,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    // Characters split across pipe chunks are held back until complete
    const decoder = new StringDecoder('utf8');
    let tail = '';
    child.stdout.on('data', (chunk: Buffer) => {
      stdout?.write(chunk);
    });
    child.stderr.on('data', (chunk: Buffer) => {
      stderr?.write(chunk);
      tail = (tail + decoder.write(chunk)).slice(-STDERR_TAIL_CHARS);
    });

    child.on('error', (err) => {
      settle({ status: 'failure', detail: `failed to start: ${err.message}` });
    });

    child.on('close', (code, signal) => {
      if (code === 0) {
        settle({ status: 'success' });
        return;
      }
      if (signal) {
        settle({ status: 'failure', detail: `terminated by ${signal}` });
        return;
      }
      tail = (tail + decoder.end()).slice(-STDERR_TAIL_CHARS);
      const output = maskSecrets(tail.trim());
      settle({
        status: 'failure',
        detail: output ? `exit ${code ?? '?'}: ${output}` : `exit ${code ?? '?'}`,
      });
    });
  });
}

/** Wrap a shell command as a sequencer step action */
export function commandAction(options: CommandActionOptions): StepAction {
  return () => runCommand(options);
}
