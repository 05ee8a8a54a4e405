#!/usr/bin/env node
import { Command, Option } from 'commander';
import type { RelayConfig } from './config.js';
import { parseInteger } from './options.js';

const program = new Command();

program
  .name('claude-relay')
  .description('Per-project claude sessions for any editor')
  .version('0.1.0');

async function readConfig(configPath: string): Promise<RelayConfig> {
  const { loadConfig, defaultConfig } = await import('./config.js');
  return loadConfig(configPath) ?? defaultConfig();
}

async function report(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    console.error(`[claude-relay] ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

const configOption = () =>
  new Option('-c, --config <path>', 'Path to claude-relay.toml config file').default('claude-relay.toml');

program
  .command('serve')
  .description('Start the HTTP bridge editors talk to')
  .option('-p, --port <port>', 'Port number', parseInteger)
  .option('--host <host>', 'Host to bind')
  .addOption(configOption())
  .action(async (opts: { port?: number; host?: string; config: string }) => {
    const config = await readConfig(opts.config);
    if (opts.port !== undefined) config.server.port = opts.port;
    if (opts.host) config.server.host = opts.host;
    const { startServeMode } = await import('./server/serve.js');
    startServeMode(config);
  });

program
  .command('session-name')
  .description('Print the session name for a file or directory')
  .argument('<path>', 'File or directory inside a project')
  .addOption(new Option('--name-from <source>', 'Directory whose name suffixes the session').choices(['parent', 'root']))
  .addOption(configOption())
  .action(async (path: string, opts: { nameFrom?: string; config: string }) => {
    await report(async () => {
      const config = await readConfig(opts.config);
      if (opts.nameFrom === 'parent' || opts.nameFrom === 'root') {
        config.session.name_from = opts.nameFrom;
      }
      const { createRelayCommands } = await import('./commands.js');
      const commands = createRelayCommands(config);
      const info = await commands.sessionInfo({ documentId: path, path });
      console.log(info.sessionName);
    });
  });

program
  .command('start')
  .description('Start the project session unless it is already running')
  .argument('<path>', 'File or directory inside a project')
  .addOption(configOption())
  .action(async (path: string, opts: { config: string }) => {
    await report(async () => {
      const { createRelayCommands } = await import('./commands.js');
      const commands = createRelayCommands(await readConfig(opts.config));
      const handle = await commands.startSession({ documentId: path, path });
      console.log(handle.created
        ? `[claude-relay] Started ${handle.name} in ${handle.root}`
        : `[claude-relay] ${handle.name} is already running`);
    });
  });

program
  .command('send')
  .description('Send a message to the project session')
  .argument('<path>', 'File or directory inside a project')
  .argument('<message...>', 'Message text')
  .option('-f, --file <name>', 'File the message is about')
  .option('-l, --line <n>', 'Line number in that file', parseInteger)
  .option('-n, --count <n>', 'Number of lines', parseInteger)
  .addOption(configOption())
  .action(async (path: string, message: string[], opts: { file?: string; line?: number; count?: number; config: string }) => {
    await report(async () => {
      const { createRelayCommands } = await import('./commands.js');
      const commands = createRelayCommands(await readConfig(opts.config));
      const { sessionName } = await commands.sendMessage({ documentId: path, path }, {
        message: message.join(' '),
        fileName: opts.file,
        lineNumber: opts.line,
        lineCount: opts.count,
      });
      console.log(`[claude-relay] Sent to ${sessionName}`);
    });
  });

program
  .command('hunk')
  .description('Print "<line> <count>" of the hunk enclosing a line of a diff (0 0 when none)')
  .argument('<diffFile>', 'File containing a unified diff')
  .requiredOption('-l, --line <n>', '1-based cursor line in the diff', parseInteger)
  .action(async (diffFile: string, opts: { line: number }) => {
    await report(async () => {
      const { readFileSync } = await import('node:fs');
      const { locateHunk } = await import('./diff/hunk.js');
      const hunk = locateHunk(readFileSync(diffFile, 'utf-8'), opts.line - 1);
      console.log(`${hunk.targetLine} ${hunk.lineCount}`);
    });
  });

program
  .command('run')
  .description('Run a one-shot prompt in the project and print the answer')
  .argument('<path>', 'File or directory inside a project')
  .argument('<prompt...>', 'Prompt text')
  .addOption(configOption())
  .action(async (path: string, prompt: string[], opts: { config: string }) => {
    await report(async () => {
      const config = await readConfig(opts.config);
      const { createRelayCommands } = await import('./commands.js');
      const commands = createRelayCommands(config);
      const ref = { documentId: path, path };
      console.log(`[claude-relay] ${config.claude.command} ${config.claude.print_flags.join(' ')} in ${commands.projectRoot(ref)}`);
      await commands.runOneShot(ref, prompt.join(' '), (chunk) => {
        process.stdout.write(chunk);
      });
    });
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`[claude-relay] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
