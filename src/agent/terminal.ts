import { execFile } from 'node:child_process';

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (file: string, args: string[]) => Promise<CommandOutput>;

export const execRunner: CommandRunner = (file, args) =>
  new Promise((resolve, reject) => {
    execFile(file, args, (err, stdout, stderr) => {
      if (err) {
        reject(err);
        return;
      }
      resolve({ stdout, stderr });
    });
  });

export interface SessionHandle {
  /** Name as tmux holds it; differs from the requested one when that had `.` or `:`. */
  name: string;
  root: string;
  /** false when the session was already running. */
  created: boolean;
}

/** Named, long-lived terminal sessions that text can be typed into. */
export interface TerminalSessions {
  has(name: string): Promise<boolean>;
  ensure(name: string, root: string): Promise<SessionHandle>;
  send(name: string, text: string): Promise<void>;
}

/** tmux stores `.` and `:` in session names as `_`. */
export function tmuxSessionName(name: string): string {
  return name.replace(/[.:]/g, '_');
}

/**
 * Sessions are detached tmux sessions running the CLI, so they outlive the
 * editor and can be attached from any terminal with `tmux attach -t <name>`.
 */
export class TmuxSessions implements TerminalSessions {
  private command: string;
  private run: CommandRunner;

  constructor(command: string, run: CommandRunner = execRunner) {
    this.command = command;
    this.run = run;
  }

  // A leading = makes tmux match the session name exactly instead of by prefix.
  async has(name: string): Promise<boolean> {
    try {
      await this.run('tmux', ['has-session', '-t', `=${tmuxSessionName(name)}`]);
      return true;
    } catch {
      return false;
    }
  }

  async ensure(name: string, root: string): Promise<SessionHandle> {
    const session = tmuxSessionName(name);
    if (await this.has(name)) {
      return { name: session, root, created: false };
    }
    try {
      await this.run('tmux', ['new-session', '-d', '-s', session, '-c', root, this.command]);
    } catch (err) {
      throw new Error(`Failed to start session ${session}: ${err instanceof Error ? err.message : String(err)}`);
    }
    return { name: session, root, created: true };
  }

  async send(name: string, text: string): Promise<void> {
    // -l types the text literally; Enter goes separately so it is sent as a key.
    const target = `=${tmuxSessionName(name)}:`;
    await this.run('tmux', ['send-keys', '-t', target, '-l', '--', text]);
    await this.run('tmux', ['send-keys', '-t', target, 'Enter']);
  }
}
