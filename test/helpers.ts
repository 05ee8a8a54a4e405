import { NoProjectRootError } from '../src/errors.js';
import type { OneShotRunner } from '../src/agent/index.js';
import type { CommandRunner, SessionHandle, TerminalSessions } from '../src/agent/terminal.js';

export const PROJECT_ROOTS = ['/work/acme/app', '/work/acme/api', '/home/dev/notes', '/work/my.proj/app'];

/** Project roots without git: a path belongs to the first root it sits under. */
export function fakeLocateRoot(path: string): string {
  const root = PROJECT_ROOTS.find((r) => path === r || path.startsWith(r + '/'));
  if (!root) {
    throw new NoProjectRootError(path);
  }
  return root;
}

export class FakeSessions implements TerminalSessions {
  running = new Set<string>();
  started: SessionHandle[] = [];
  sent: { name: string; text: string }[] = [];

  async has(name: string): Promise<boolean> {
    return this.running.has(name);
  }

  async ensure(name: string, root: string): Promise<SessionHandle> {
    if (this.running.has(name)) {
      return { name, root, created: false };
    }
    this.running.add(name);
    const handle = { name, root, created: true };
    this.started.push(handle);
    return handle;
  }

  async send(name: string, text: string): Promise<void> {
    this.sent.push({ name, text });
  }
}

export class FakeRunner implements OneShotRunner {
  calls: { root: string; prompt: string }[] = [];
  chunks: string[];
  failWith?: Error;

  constructor(chunks: string[] = []) {
    this.chunks = chunks;
  }

  async runPrint(root: string, prompt: string, onChunk: (chunk: string) => void): Promise<void> {
    this.calls.push({ root, prompt });
    for (const chunk of this.chunks) {
      onChunk(chunk);
    }
    if (this.failWith) {
      throw this.failWith;
    }
  }
}

// Behaves like tmux: names are stored with . and : turned into _, and a target
// without a leading = also matches by prefix.
export function fakeTmux(existing: string[] = []) {
  const calls: string[][] = [];
  const sessions = new Set(existing);
  const lookup = (target: string): boolean => {
    if (target.startsWith('=')) {
      return sessions.has(target.slice(1).replace(/:$/, ''));
    }
    return [...sessions].some((name) => name.startsWith(target));
  };
  const run: CommandRunner = async (file, args) => {
    calls.push([file, ...args]);
    if ((args[0] === 'has-session' || args[0] === 'send-keys') && !lookup(args[2] ?? '')) {
      throw new Error(`can't find session: ${args[2]}`);
    }
    if (args[0] === 'new-session') {
      sessions.add((args[3] ?? '').replace(/[.:]/g, '_'));
    }
    return { stdout: '', stderr: '' };
  };
  return { calls, run };
}
