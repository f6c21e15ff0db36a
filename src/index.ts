import 'dotenv/config';
import pino from 'pino';
import type { Client } from 'discord.js';

import { parseConfig } from './config.js';
import { startTriggerBot } from './discord.js';
import { loadTriggerStore, resolveTriggersPath } from './triggers/store.js';

const log = pino({ level: process.env.LOG_LEVEL ?? 'info' });

let parsedConfig;
try {
  parsedConfig = parseConfig(process.env);
} catch (err) {
  log.error({ err }, 'Invalid configuration');
  process.exit(1);
}
for (const warning of parsedConfig.warnings) {
  log.warn(warning);
}
for (const info of parsedConfig.infos) {
  log.info(info);
}
const cfg = parsedConfig.config;

const store = await loadTriggerStore(resolveTriggersPath(cfg.dataDir), {
  phraseLimit: cfg.phraseLimit,
  log,
});
log.info(
  { path: store.path, guilds: store.guildCount(), triggers: store.triggerCount(), phraseLimit: store.phraseLimit },
  'triggers:store loaded',
);

let client: Client | null = null;

const shutdown = async () => {
  log.info('shutdown:signal received');
  try {
    await client?.destroy();
  } catch (err) {
    log.warn({ err }, 'shutdown:failed to close discord client');
  }
  process.exit(0);
};
process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

try {
  client = await startTriggerBot({
    token: cfg.token,
    store,
    syncCommands: cfg.syncCommands,
    commandGuildId: cfg.commandGuildId,
    log,
  });
} catch (err) {
  log.error({ err }, 'startup:failed to connect to Discord');
  process.exit(1);
}
