import { serve } from '@hono/node-server';
import { createApp } from './index.js';
import { createRelayCommands } from '../commands.js';
import type { RelayConfig } from '../config.js';

export function startServeMode(config: RelayConfig): void {
  const commands = createRelayCommands(config);
  const app = createApp(commands);
  const { host, port } = config.server;

  serve({
    fetch: app.fetch,
    port,
    hostname: host,
  }, (info) => {
    const displayHost = host === '0.0.0.0' ? 'localhost' : host;
    console.log(`[claude-relay] Listening on http://${displayHost}:${info.port}`);
    console.log(`[claude-relay] Session names: ${config.session.prefix}<${config.session.name_from === 'root' ? 'project' : 'parent of project'}>`);
  });
}
