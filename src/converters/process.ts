import { spawn } from 'node:child_process';
import { readFile } from 'node:fs/promises';
import { RenderError } from '../errors.js';

export interface CommandOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  signal?: AbortSignal;
}

export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

const MAX_CAPTURE = 64 * 1024;

function append(buffer: string, chunk: Buffer): string {
  const next = buffer + chunk.toString('utf8');
  return next.length > MAX_CAPTURE ? next.slice(next.length - MAX_CAPTURE) : next;
}

/**
 * Runs a command to completion without a shell. Rejects with a RenderError
 * when it cannot be started or is aborted; a non-zero exit resolves.
 */
export function runCommand(command: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(new RenderError(`${command} not started: aborted`));
      return;
    }

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      signal: options.signal,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    child.stdout.on('data', (chunk: Buffer) => {
      stdout = append(stdout, chunk);
    });
    child.stderr.on('data', (chunk: Buffer) => {
      stderr = append(stderr, chunk);
    });

    child.once('error', (error) => {
      const reason = error.name === 'AbortError' ? 'timed out or was aborted' : error.message;
      reject(new RenderError(`${command} ${reason}`, stderr, { cause: error }));
    });
    child.once('close', (code) => {
      resolve({ code, stdout, stderr });
    });
  });
}

/** Reads an engine's output file; a missing or empty file is a render failure. */
export async function readOutputFile(file: string, engine: string, stderr: string): Promise<Buffer> {
  let data: Buffer;
  try {
    data = await readFile(file);
  } catch (error) {
    throw new RenderError(`${engine} produced no output`, stderr, { cause: error });
  }
  if (data.length === 0) {
    throw new RenderError(`${engine} produced an empty file`, stderr);
  }
  return data;
}

/** Splits a configured command line such as `xvfb-run -a drawio` on whitespace. */
export function splitCommandLine(line: string): { command: string; prefixArgs: string[] } {
  const [command = '', ...prefixArgs] = line.trim().split(/\s+/);
  return { command, prefixArgs };
}
