import { ClaudeCli } from './agent/claude.js';
import type { OneShotRunner } from './agent/index.js';
import { composeContextMessage, composeRegionMessage, type ContextMessage } from './agent/message.js';
import { TmuxSessions, type SessionHandle, type TerminalSessions } from './agent/terminal.js';
import type { RelayConfig } from './config.js';
import { locateHunk, type HunkTarget } from './diff/hunk.js';
import { EmptySelectionError, InvalidRequestError, NoSessionFoundError } from './errors.js';
import { locateProjectRoot, type RootLocator } from './project/root.js';
import { DocumentStore } from './session/documents.js';
import { SessionRegistry, type DocumentContext, type LinkedBuffer } from './session/registry.js';

/** How an editor identifies the document a command was invoked from. */
export interface DocumentRef {
  documentId: string;
  path: string;
}

export interface SessionInfo {
  sessionName: string;
  root: string | null;
  running: boolean;
}

export interface SendResult {
  sessionName: string;
}

export interface RegionRequest {
  region: string;
  message?: string;
}

export interface DiffContextRequest {
  diffText: string;
  /** 0-based line of the cursor in `diffText`. */
  cursorLine: number;
  fileName: string;
  message: string;
}

export interface RelayDeps {
  registry: SessionRegistry;
  documents: DocumentStore;
  sessions: TerminalSessions;
  runner: OneShotRunner;
}

/** The user-invoked operations. Each one runs to completion or throws a RelayError. */
export class RelayCommands {
  readonly registry: SessionRegistry;
  readonly documents: DocumentStore;
  private sessions: TerminalSessions;
  private runner: OneShotRunner;

  constructor(deps: RelayDeps) {
    this.registry = deps.registry;
    this.documents = deps.documents;
    this.sessions = deps.sessions;
    this.runner = deps.runner;
  }

  private context(ref: DocumentRef): DocumentContext {
    return this.documents.getOrCreate(ref.documentId, ref.path);
  }

  private async requireSession(ctx: DocumentContext): Promise<string> {
    const sessionName = this.registry.resolveSessionName(ctx);
    if (!(await this.sessions.has(sessionName))) {
      throw new NoSessionFoundError(sessionName);
    }
    return sessionName;
  }

  projectRoot(ref: DocumentRef): string {
    return this.registry.projectRoot(this.context(ref));
  }

  async sessionInfo(ref: DocumentRef): Promise<SessionInfo> {
    const ctx = this.context(ref);
    const sessionName = this.registry.resolveSessionName(ctx);
    return {
      sessionName,
      root: this.registry.tryProjectRoot(ctx),
      running: await this.sessions.has(sessionName),
    };
  }

  async startSession(ref: DocumentRef): Promise<SessionHandle> {
    const ctx = this.context(ref);
    const sessionName = this.registry.resolveSessionName(ctx);
    const root = this.registry.projectRoot(ctx);
    const handle = await this.sessions.ensure(sessionName, root);
    if (handle.created) {
      console.log(`[claude-relay] Started session ${handle.name} in ${root}`);
    }
    return handle;
  }

  setSessionName(ref: DocumentRef, name: string): string {
    if (!name.trim()) {
      throw new InvalidRequestError('Session name must not be empty');
    }
    this.registry.setOverride(this.context(ref), name);
    return name;
  }

  async sendMessage(ref: DocumentRef, msg: ContextMessage): Promise<SendResult> {
    const sessionName = await this.requireSession(this.context(ref));
    await this.sessions.send(sessionName, composeContextMessage(msg));
    return { sessionName };
  }

  async sendRegion(ref: DocumentRef, req: RegionRequest): Promise<SendResult> {
    if (!req.region.trim()) {
      throw new EmptySelectionError();
    }
    const sessionName = await this.requireSession(this.context(ref));
    await this.sessions.send(sessionName, composeRegionMessage(req.region, req.message));
    return { sessionName };
  }

  async sendDiffContext(ref: DocumentRef, req: DiffContextRequest): Promise<SendResult & HunkTarget> {
    const sessionName = await this.requireSession(this.context(ref));
    const hunk = locateHunk(req.diffText, req.cursorLine);
    const text = composeContextMessage({
      message: req.message,
      fileName: req.fileName,
      lineNumber: hunk.targetLine,
      lineCount: hunk.lineCount,
    });
    await this.sessions.send(sessionName, text);
    return { sessionName, ...hunk };
  }

  /** Register a prompt document bound to the invoking document's session. */
  newPromptDocument(ref: DocumentRef): LinkedBuffer {
    const ctx = this.context(ref);
    const linked = this.registry.newLinkedBuffer(ctx);
    const promptDoc = this.documents.getOrCreate(linked.bufferName, ctx.currentPath);
    this.registry.setOverride(promptDoc, linked.sessionName);
    return linked;
  }

  async runOneShot(ref: DocumentRef, prompt: string, onChunk: (chunk: string) => void): Promise<void> {
    if (!prompt.trim()) {
      throw new InvalidRequestError('Prompt must not be empty');
    }
    const root = this.projectRoot(ref);
    await this.runner.runPrint(root, prompt, onChunk);
  }

  closeDocument(documentId: string): boolean {
    return this.documents.delete(documentId);
  }
}

export function createRelayCommands(config: RelayConfig, locateRoot: RootLocator = locateProjectRoot): RelayCommands {
  return new RelayCommands({
    registry: new SessionRegistry({
      locateRoot,
      prefix: config.session.prefix,
      promptPrefix: config.session.prompt_prefix,
      nameFrom: config.session.name_from,
    }),
    documents: new DocumentStore(),
    sessions: new TmuxSessions(config.claude.command),
    runner: new ClaudeCli(config.claude),
  });
}
