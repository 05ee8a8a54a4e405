import type { Context, Hono } from 'hono';
import { streamText } from 'hono/streaming';
import type { DocumentRef, RelayCommands } from '../commands.js';
import { lineAtOffset } from '../diff/hunk.js';
import { RelayError, type RelayErrorCode } from '../errors.js';

type JsonBody = Record<string, unknown>;

async function readJson(c: Context): Promise<JsonBody | null> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return null;
  }
  return isJsonBody(body) ? body : null;
}

function isJsonBody(value: unknown): value is JsonBody {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function documentRef(body: JsonBody): DocumentRef | null {
  const { documentId, path } = body;
  if (typeof documentId !== 'string' || !documentId || typeof path !== 'string' || !path) {
    return null;
  }
  return { documentId, path };
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
}

const STATUS_BY_CODE: Record<RelayErrorCode, 400 | 404> = {
  NO_PROJECT_ROOT: 404,
  NO_SESSION_FOUND: 404,
  EMPTY_SELECTION: 400,
  INVALID_REQUEST: 400,
};

function invalidJson(c: Context) {
  return c.json({ error: 'Invalid JSON in request body', code: 'INVALID_REQUEST' }, 400);
}

function missingFields(c: Context) {
  return c.json({ error: 'Missing required fields', code: 'INVALID_REQUEST' }, 400);
}

function errorResponse(c: Context, err: unknown) {
  if (err instanceof RelayError) {
    return c.json({ error: err.message, code: err.code }, STATUS_BY_CODE[err.code]);
  }
  console.error(`[claude-relay] ${c.req.path} failed:`, err);
  return c.json(
    { error: err instanceof Error ? err.message : 'Unknown error', code: 'INTERNAL' },
    500,
  );
}

export function registerApiRoutes(app: Hono, commands: RelayCommands): void {
  app.post('/api/session/resolve', async (c) => {
    const body = await readJson(c);
    if (!body) return invalidJson(c);
    const ref = documentRef(body);
    if (!ref) return missingFields(c);

    try {
      return c.json(await commands.sessionInfo(ref));
    } catch (err) {
      return errorResponse(c, err);
    }
  });

  app.post('/api/session/override', async (c) => {
    const body = await readJson(c);
    if (!body) return invalidJson(c);
    const ref = documentRef(body);
    if (!ref || typeof body.name !== 'string') return missingFields(c);

    try {
      return c.json({ sessionName: commands.setSessionName(ref, body.name) });
    } catch (err) {
      return errorResponse(c, err);
    }
  });

  app.post('/api/session/start', async (c) => {
    const body = await readJson(c);
    if (!body) return invalidJson(c);
    const ref = documentRef(body);
    if (!ref) return missingFields(c);

    try {
      const handle = await commands.startSession(ref);
      return c.json({ sessionName: handle.name, root: handle.root, created: handle.created });
    } catch (err) {
      return errorResponse(c, err);
    }
  });

  app.post('/api/send', async (c) => {
    const body = await readJson(c);
    if (!body) return invalidJson(c);
    const ref = documentRef(body);
    if (!ref || typeof body.message !== 'string') return missingFields(c);

    try {
      const result = await commands.sendMessage(ref, {
        message: body.message,
        fileName: optionalString(body.fileName),
        lineNumber: optionalNumber(body.lineNumber),
        lineCount: optionalNumber(body.lineCount),
      });
      return c.json(result);
    } catch (err) {
      return errorResponse(c, err);
    }
  });

  app.post('/api/send-region', async (c) => {
    const body = await readJson(c);
    if (!body) return invalidJson(c);
    const ref = documentRef(body);
    if (!ref || typeof body.region !== 'string') return missingFields(c);

    try {
      const result = await commands.sendRegion(ref, {
        region: body.region,
        message: optionalString(body.message),
      });
      return c.json(result);
    } catch (err) {
      return errorResponse(c, err);
    }
  });

  app.post('/api/send-diff', async (c) => {
    const body = await readJson(c);
    if (!body) return invalidJson(c);
    const ref = documentRef(body);
    const { diffText, fileName, message } = body;
    const cursorOffset = optionalNumber(body.cursorOffset);
    // Editors that only know a character offset may send cursorOffset instead.
    const cursorLine = cursorOffset !== undefined && typeof diffText === 'string'
      ? lineAtOffset(diffText, cursorOffset)
      : optionalNumber(body.cursorLine);
    if (
      !ref ||
      cursorLine === undefined ||
      typeof diffText !== 'string' ||
      typeof fileName !== 'string' ||
      typeof message !== 'string'
    ) {
      return missingFields(c);
    }

    try {
      return c.json(await commands.sendDiffContext(ref, { diffText, cursorLine, fileName, message }));
    } catch (err) {
      return errorResponse(c, err);
    }
  });

  app.post('/api/prompt-document', async (c) => {
    const body = await readJson(c);
    if (!body) return invalidJson(c);
    const ref = documentRef(body);
    if (!ref) return missingFields(c);

    try {
      return c.json(commands.newPromptDocument(ref));
    } catch (err) {
      return errorResponse(c, err);
    }
  });

  app.post('/api/run', async (c) => {
    const body = await readJson(c);
    if (!body) return invalidJson(c);
    const ref = documentRef(body);
    const { prompt } = body;
    if (!ref || typeof prompt !== 'string' || !prompt.trim()) return missingFields(c);

    // Resolve the root up front so a bad path is a JSON error, not a half-written stream.
    try {
      commands.projectRoot(ref);
    } catch (err) {
      return errorResponse(c, err);
    }

    return streamText(
      c,
      async (stream) => {
        const writes: Promise<unknown>[] = [];
        await commands.runOneShot(ref, prompt, (chunk) => {
          writes.push(stream.write(chunk));
        });
        await Promise.all(writes);
      },
      async (err, stream) => {
        console.error(`[claude-relay] /api/run failed:`, err);
        await stream.writeln(`\n[claude-relay] ${err.message}`);
      },
    );
  });

  app.post('/api/document/close', async (c) => {
    const body = await readJson(c);
    if (!body) return invalidJson(c);
    if (typeof body.documentId !== 'string' || !body.documentId) return missingFields(c);

    return c.json({ success: commands.closeDocument(body.documentId) });
  });
}
