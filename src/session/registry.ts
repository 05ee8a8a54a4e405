import { basename, dirname } from 'node:path';
import { NoProjectRootError } from '../errors.js';
import type { RootLocator } from '../project/root.js';

/** Which directory's base name suffixes a derived session name. */
export type NameSource = 'parent' | 'root';

/** Session binding of one editor document. */
export interface DocumentContext {
  readonly documentId: string;
  currentPath: string;
  overrideName?: string;
}

export interface LinkedBuffer {
  bufferName: string;
  sessionName: string;
}

export interface RegistryOptions {
  locateRoot: RootLocator;
  prefix?: string;
  promptPrefix?: string;
  /**
   * Defaults to 'parent': `claude-<basename of the root's parent>`, the
   * historical naming every existing session was created under.
   */
  nameFrom?: NameSource;
}

export const DEFAULT_SESSION_PREFIX = 'claude-';
export const DEFAULT_PROMPT_PREFIX = 'claude-prompt-';

export class SessionRegistry {
  private locateRoot: RootLocator;
  private prefix: string;
  private promptPrefix: string;
  private nameFrom: NameSource;

  constructor(options: RegistryOptions) {
    this.locateRoot = options.locateRoot;
    this.prefix = options.prefix ?? DEFAULT_SESSION_PREFIX;
    this.promptPrefix = options.promptPrefix ?? DEFAULT_PROMPT_PREFIX;
    this.nameFrom = options.nameFrom ?? 'parent';
  }

  /** Session name for a project root. Pure: the same root always gives the same name. */
  deriveName(root: string): string {
    const dir = this.nameFrom === 'parent' ? dirname(root) : root;
    return this.prefix + basename(dir);
  }

  resolveSessionName(ctx: DocumentContext): string {
    if (ctx.overrideName !== undefined) {
      return ctx.overrideName;
    }
    return this.deriveName(this.projectRoot(ctx));
  }

  projectRoot(ctx: DocumentContext): string {
    return this.locateRoot(ctx.currentPath);
  }

  /** Like projectRoot, but null when the document is outside any project. */
  tryProjectRoot(ctx: DocumentContext): string | null {
    try {
      return this.locateRoot(ctx.currentPath);
    } catch (err) {
      if (err instanceof NoProjectRootError) return null;
      throw err;
    }
  }

  setOverride(ctx: DocumentContext, name: string): void {
    ctx.overrideName = name;
  }

  /**
   * Name a new prompt document and the session it should be bound to.
   * Binding is left to the caller, so `sessionName` reflects the context as it is now.
   */
  newLinkedBuffer(ctx: DocumentContext): LinkedBuffer {
    const sessionName = this.resolveSessionName(ctx);
    const root = this.tryProjectRoot(ctx);
    const projectName = basename(root ?? ctx.currentPath);
    return {
      bufferName: this.promptPrefix + projectName,
      sessionName,
    };
  }
}
