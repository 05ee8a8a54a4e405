import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'toml';
import type { NameSource } from './session/registry.js';

export interface ClaudeConfig {
  command: string;
  print_flags: string[];
  model?: string;
  timeout_ms: number;
}

export interface SessionConfig {
  prefix: string;
  prompt_prefix: string;
  name_from: NameSource;
}

export interface ServerConfig {
  port: number;
  host: string;
}

export interface RelayConfig {
  claude: ClaudeConfig;
  session: SessionConfig;
  server: ServerConfig;
}

export function defaultConfig(): RelayConfig {
  return {
    claude: {
      command: 'claude',
      print_flags: ['--print'],
      timeout_ms: 120_000,
    },
    session: {
      prefix: 'claude-',
      prompt_prefix: 'claude-prompt-',
      name_from: 'parent',
    },
    server: {
      port: 4322,
      host: '127.0.0.1',
    },
  };
}

export function loadConfig(configPath: string): RelayConfig | null {
  const absPath = resolve(configPath);
  if (!existsSync(absPath)) {
    return null;
  }

  let raw: string;
  try {
    raw = readFileSync(absPath, 'utf-8');
  } catch (err) {
    console.error(`[claude-relay] Failed to read config: ${absPath}`);
    console.error(err instanceof Error ? err.message : err);
    return null;
  }

  let parsed: {
    claude?: {
      command?: unknown;
      print_flags?: unknown;
      model?: unknown;
      timeout_ms?: unknown;
    };
    session?: {
      prefix?: unknown;
      prompt_prefix?: unknown;
      name_from?: unknown;
    };
    server?: {
      port?: unknown;
      host?: unknown;
    };
  };
  try {
    parsed = parse(raw) as typeof parsed;
  } catch (err) {
    console.error(`[claude-relay] Invalid TOML in config: ${absPath}`);
    console.error(err instanceof Error ? err.message : err);
    return null;
  }

  const defaults = defaultConfig();
  const nameFrom = parsed.session?.name_from;
  if (nameFrom !== undefined && nameFrom !== 'parent' && nameFrom !== 'root') {
    console.warn(`[claude-relay] Unknown session.name_from "${String(nameFrom)}", using "parent"`);
  }

  return {
    claude: {
      command: stringOr(parsed.claude?.command, defaults.claude.command),
      print_flags: flagsOr(parsed.claude?.print_flags, defaults.claude.print_flags),
      model: typeof parsed.claude?.model === 'string' ? parsed.claude.model : undefined,
      timeout_ms: numberOr(parsed.claude?.timeout_ms, defaults.claude.timeout_ms),
    },
    session: {
      prefix: stringOr(parsed.session?.prefix, defaults.session.prefix),
      prompt_prefix: stringOr(parsed.session?.prompt_prefix, defaults.session.prompt_prefix),
      name_from: nameFrom === 'root' ? 'root' : 'parent',
    },
    server: {
      port: numberOr(parsed.server?.port, defaults.server.port),
      host: stringOr(parsed.server?.host, defaults.server.host),
    },
  };
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

// Accepts either an array of flags or a single whitespace-separated string.
function flagsOr(value: unknown, fallback: string[]): string[] {
  if (typeof value === 'string') {
    return value.split(/\s+/).filter(Boolean);
  }
  if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) {
    return [...value];
  }
  return fallback;
}
