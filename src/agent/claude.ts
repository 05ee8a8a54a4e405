import { spawn } from 'node:child_process';
import type { OneShotRunner } from './index.js';
import type { ClaudeConfig } from '../config.js';

/** Runs the CLI non-interactively (`claude --print`) and streams what it prints. */
export class ClaudeCli implements OneShotRunner {
  private command: string;
  private printFlags: string[];
  private model?: string;
  private timeoutMs: number;

  constructor(config: ClaudeConfig) {
    this.command = config.command;
    this.printFlags = config.print_flags;
    this.model = config.model;
    this.timeoutMs = config.timeout_ms;
  }

  buildArgs(): string[] {
    const args = [...this.printFlags];
    if (this.model) args.push('--model', this.model);
    return args;
  }

  runPrint(root: string, prompt: string, onChunk: (chunk: string) => void): Promise<void> {
    return new Promise((resolve, reject) => {
      const proc = spawn(this.command, this.buildArgs(), {
        cwd: root,
        env: childEnv(process.env),
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      // A child that exits without reading its input makes the write fail with EPIPE.
      let stdinError: Error | null = null;
      const stdinSettled = new Promise<void>((done) => {
        proc.stdin.on('error', (err) => {
          stdinError = err;
          done();
        });
        proc.stdin.on('finish', done);
        proc.stdin.on('close', done);
      });

      proc.stdin.write(prompt);
      proc.stdin.end();

      let stderr = '';
      const timeout = setTimeout(() => {
        proc.kill();
        reject(new Error(`${this.command} timed out after ${this.timeoutMs / 1000}s`));
      }, this.timeoutMs);

      proc.stdout.on('data', (data: Buffer) => {
        onChunk(data.toString());
      });
      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });
      proc.on('close', (code) => {
        clearTimeout(timeout);
        void stdinSettled.then(() => {
          if (code !== 0) {
            reject(new Error(`${this.command} exited with code ${code}: ${stderr.trim()}`));
          } else if (stdinError) {
            reject(new Error(`${this.command} exited before reading the prompt: ${stdinError.message}`));
          } else {
            resolve();
          }
        });
      });
      proc.on('error', (err) => {
        clearTimeout(timeout);
        reject(new Error(`Failed to spawn ${this.command}: ${err.message}`));
      });
    });
  }
}

/**
 * Environment for the child process. CLAUDECODE is dropped so the CLI does not
 * refuse to run when the relay itself was started from inside a session.
 */
export function childEnv(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  return Object.fromEntries(
    Object.entries(env).filter(([key]) => key !== 'CLAUDECODE'),
  );
}
