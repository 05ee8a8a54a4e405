import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { RelayCommands } from '../src/commands.js';
import { DocumentStore } from '../src/session/documents.js';
import { SessionRegistry } from '../src/session/registry.js';
import {
  EmptySelectionError,
  InvalidRequestError,
  NoProjectRootError,
  NoSessionFoundError,
} from '../src/errors.js';
import { TmuxSessions } from '../src/agent/terminal.js';
import { FakeRunner, FakeSessions, fakeLocateRoot, fakeTmux } from './helpers.js';

function setup(runner = new FakeRunner()) {
  const sessions = new FakeSessions();
  const commands = new RelayCommands({
    registry: new SessionRegistry({ locateRoot: fakeLocateRoot }),
    documents: new DocumentStore(),
    sessions,
    runner,
  });
  return { commands, sessions, runner };
}

const MAIN = { documentId: 'main.ts', path: '/work/acme/app/src/main.ts' };
const OUTSIDE = { documentId: 'scratch', path: '/tmp/scratch.txt' };

describe('RelayCommands.startSession', () => {
  it('導出した名前とプロジェクトルートでセッションを起動する', async () => {
    const { commands, sessions } = setup();
    const handle = await commands.startSession(MAIN);
    assert.deepEqual(handle, { name: 'claude-acme', root: '/work/acme/app', created: true });
    assert.deepEqual(sessions.started, [handle]);
  });

  it('2回目は既存セッションを使う', async () => {
    const { commands } = setup();
    await commands.startSession(MAIN);
    const again = await commands.startSession(MAIN);
    assert.equal(again.created, false);
  });

  it('プロジェクト外ではNoProjectRootError', async () => {
    const { commands, sessions } = setup();
    await assert.rejects(commands.startSession(OUTSIDE), NoProjectRootError);
    assert.equal(sessions.started.length, 0);
  });
});

describe('RelayCommands.sessionInfo', () => {
  it('起動前はrunning: false', async () => {
    const { commands } = setup();
    assert.deepEqual(await commands.sessionInfo(MAIN), {
      sessionName: 'claude-acme',
      root: '/work/acme/app',
      running: false,
    });
  });

  it('オーバーライドがあればプロジェクト外でもrootはnullで返す', async () => {
    const { commands } = setup();
    commands.setSessionName(OUTSIDE, 'manual');
    assert.deepEqual(await commands.sessionInfo(OUTSIDE), {
      sessionName: 'manual',
      root: null,
      running: false,
    });
  });
});

describe('RelayCommands.setSessionName', () => {
  it('ドキュメントにオーバーライドを設定する', async () => {
    const { commands } = setup();
    assert.equal(commands.setSessionName(MAIN, 'claude-review'), 'claude-review');
    assert.equal(commands.documents.get('main.ts')?.overrideName, 'claude-review');
    assert.equal((await commands.sessionInfo(MAIN)).sessionName, 'claude-review');
  });

  it('空の名前は拒否し、既存のオーバーライドを残す', () => {
    const { commands } = setup();
    commands.setSessionName(MAIN, 'keep');
    assert.throws(() => commands.setSessionName(MAIN, '   '), InvalidRequestError);
    assert.equal(commands.documents.get('main.ts')?.overrideName, 'keep');
  });

  it('他のドキュメントには影響しない', async () => {
    const { commands } = setup();
    commands.setSessionName(MAIN, 'pinned');
    const other = { documentId: 'util.ts', path: '/work/acme/app/src/util.ts' };
    assert.equal((await commands.sessionInfo(other)).sessionName, 'claude-acme');
  });
});

describe('RelayCommands.sendMessage', () => {
  it('ファイル情報付きのメッセージを送る', async () => {
    const { commands, sessions } = setup();
    await commands.startSession(MAIN);
    const result = await commands.sendMessage(MAIN, {
      message: 'why?',
      fileName: 'src/main.ts',
      lineNumber: 42,
      lineCount: 5,
    });
    assert.deepEqual(result, { sessionName: 'claude-acme' });
    assert.deepEqual(sessions.sent, [{
      name: 'claude-acme',
      text: 'File name: src/main.ts\n\nline number: 42\n\nline count: 5\n\nwhy?',
    }]);
  });

  it('セッションが起動していなければNoSessionFoundError', async () => {
    const { commands, sessions } = setup();
    await assert.rejects(
      commands.sendMessage(MAIN, { message: 'hi' }),
      (err: unknown) => err instanceof NoSessionFoundError && err.sessionName === 'claude-acme',
    );
    assert.equal(sessions.sent.length, 0);
  });

  it('オーバーライド先のセッションに送る', async () => {
    const { commands, sessions } = setup();
    sessions.running.add('claude-review');
    commands.setSessionName(MAIN, 'claude-review');
    await commands.sendMessage(MAIN, { message: 'hi' });
    assert.deepEqual(sessions.sent, [{ name: 'claude-review', text: 'hi' }]);
  });
});

describe('RelayCommands.sendRegion', () => {
  it('選択範囲とメッセージを送る', async () => {
    const { commands, sessions } = setup();
    await commands.startSession(MAIN);
    await commands.sendRegion(MAIN, { region: 'const x = 1;', message: 'rename x' });
    assert.deepEqual(sessions.sent, [{ name: 'claude-acme', text: 'const x = 1;\n\nrename x' }]);
  });

  it('空の選択範囲はEmptySelectionError', async () => {
    const { commands, sessions } = setup();
    await commands.startSession(MAIN);
    await assert.rejects(commands.sendRegion(MAIN, { region: ' \n\t' }), EmptySelectionError);
    assert.equal(sessions.sent.length, 0);
  });

  it('選択範囲の検査はセッションの検査より先', async () => {
    const { commands } = setup();
    await assert.rejects(commands.sendRegion(OUTSIDE, { region: '' }), EmptySelectionError);
  });
});

describe('RelayCommands.sendDiffContext', () => {
  const diffText = ['@@ -10,5 +20,3 @@', 'line A', 'line B'].join('\n');

  it('ハンクの行番号と行数を付けて送る', async () => {
    const { commands, sessions } = setup();
    await commands.startSession(MAIN);
    const result = await commands.sendDiffContext(MAIN, {
      diffText,
      cursorLine: 2,
      fileName: 'src/main.ts',
      message: 'is this right?',
    });
    assert.deepEqual(result, { sessionName: 'claude-acme', targetLine: 20, lineCount: 3 });
    assert.equal(
      sessions.sent[0]?.text,
      'File name: src/main.ts\n\nline number: 20\n\nline count: 3\n\nis this right?',
    );
  });

  it('ハンクがなければline number 0でline countなし', async () => {
    const { commands, sessions } = setup();
    await commands.startSession(MAIN);
    const result = await commands.sendDiffContext(MAIN, {
      diffText: 'no header',
      cursorLine: 0,
      fileName: 'src/main.ts',
      message: 'hm',
    });
    assert.deepEqual(result, { sessionName: 'claude-acme', targetLine: 0, lineCount: 0 });
    assert.equal(sessions.sent[0]?.text, 'File name: src/main.ts\n\nline number: 0\n\nhm');
  });
});

describe('RelayCommands.newPromptDocument', () => {
  it('プロンプト用ドキュメントを同じセッションに紐付けて登録する', async () => {
    const { commands } = setup();
    const linked = commands.newPromptDocument(MAIN);
    assert.deepEqual(linked, { bufferName: 'claude-prompt-app', sessionName: 'claude-acme' });
    assert.deepEqual(commands.documents.get('claude-prompt-app'), {
      documentId: 'claude-prompt-app',
      currentPath: '/work/acme/app/src/main.ts',
      overrideName: 'claude-acme',
    });
  });

  it('元ドキュメントのオーバーライドを引き継ぐ', () => {
    const { commands } = setup();
    commands.setSessionName(MAIN, 'claude-review');
    const linked = commands.newPromptDocument(MAIN);
    assert.equal(linked.sessionName, 'claude-review');
    assert.equal(commands.documents.get(linked.bufferName)?.overrideName, 'claude-review');
  });

  it('元ドキュメントのバインディングは変えない', () => {
    const { commands } = setup();
    commands.newPromptDocument(MAIN);
    assert.equal(commands.documents.get('main.ts')?.overrideName, undefined);
  });
});

describe('RelayCommands.runOneShot', () => {
  it('プロジェクトルートで実行し出力を流す', async () => {
    const { commands, runner } = setup(new FakeRunner(['hello ', 'world']));
    const chunks: string[] = [];
    await commands.runOneShot(MAIN, 'summarize', (chunk) => chunks.push(chunk));
    assert.deepEqual(runner.calls, [{ root: '/work/acme/app', prompt: 'summarize' }]);
    assert.equal(chunks.join(''), 'hello world');
  });

  it('空のプロンプトはInvalidRequestError', async () => {
    const { commands, runner } = setup();
    await assert.rejects(commands.runOneShot(MAIN, '  ', () => {}), InvalidRequestError);
    assert.equal(runner.calls.length, 0);
  });

  it('プロジェクト外ではNoProjectRootError', async () => {
    const { commands } = setup();
    await assert.rejects(commands.runOneShot(OUTSIDE, 'x', () => {}), NoProjectRootError);
  });
});

describe('RelayCommands.closeDocument', () => {
  it('閉じたドキュメントのオーバーライドは残らない', async () => {
    const { commands } = setup();
    commands.setSessionName(MAIN, 'pinned');
    assert.equal(commands.closeDocument('main.ts'), true);
    assert.equal((await commands.sessionInfo(MAIN)).sessionName, 'claude-acme');
  });

  it('未登録のIDはfalse', () => {
    const { commands } = setup();
    assert.equal(commands.closeDocument('unknown'), false);
  });
});

describe('RelayCommands with tmux sessions', () => {
  function withTmux() {
    const tmux = fakeTmux();
    const commands = new RelayCommands({
      registry: new SessionRegistry({ locateRoot: fakeLocateRoot }),
      documents: new DocumentStore(),
      sessions: new TmuxSessions('claude', tmux.run),
      runner: new FakeRunner(),
    });
    return { commands, calls: tmux.calls };
  }

  it('.を含む導出名でも起動後にメッセージを送れる', async () => {
    const { commands, calls } = withTmux();
    const doc = { documentId: 'main.ts', path: '/work/my.proj/app/main.ts' };
    const handle = await commands.startSession(doc);
    assert.deepEqual(handle, { name: 'claude-my_proj', root: '/work/my.proj/app', created: true });
    const result = await commands.sendMessage(doc, { message: 'hi' });
    assert.deepEqual(result, { sessionName: 'claude-my.proj' });
    assert.deepEqual(calls.at(-1), ['tmux', 'send-keys', '-t', '=claude-my_proj:', 'Enter']);
  });

  it(':を含むオーバーライド名でも起動後にメッセージを送れる', async () => {
    const { commands, calls } = withTmux();
    commands.setSessionName(MAIN, 'review:2');
    await commands.startSession(MAIN);
    await commands.sendMessage(MAIN, { message: 'hi' });
    assert.deepEqual(calls.at(-2), ['tmux', 'send-keys', '-t', '=review_2:', '-l', '--', 'hi']);
  });
});
