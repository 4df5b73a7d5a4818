import { serve } from '@hono/node-server';
import { createApp } from './index';
import { loadConfig } from './lib/config';
import { LeagueSession } from './lib/session';
import { LeagueStore } from './lib/store';

const config = loadConfig();
const session = new LeagueSession({
  store: new LeagueStore(config.stateFile),
  seed: config.seed,
});
const app = createApp({ session, environment: config.environment });

serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.info('api.server.listening', {
    port: info.port,
    environment: config.environment,
    stateFile: config.stateFile,
  });
});
