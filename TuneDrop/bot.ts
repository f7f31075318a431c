import * as dotenv from 'dotenv';
import { loadConfig } from './config';
import { BOT_COMMANDS, createBot } from './botFactory';
import { runNonCritical } from './services/nonCritical';

dotenv.config();

const { bot, services } = createBot(loadConfig());

export { services };
export default bot;

function shutdown(signal: string): void {
  console.log(`[bot] ${signal} received, stopping`);
  services.scheduler.cancelAll();
  bot.stop(signal);
  services.db.close();
  services.sessions.close().catch((err: unknown) => {
    console.error('[bot] Could not close the session store', err);
  });
}

async function main(): Promise<void> {
  await runNonCritical('register command list', () => bot.telegram.setMyCommands(BOT_COMMANDS));
  console.log('[bot] TuneDrop is starting (long polling)...');

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  // Resolves once polling stops
  await bot.launch();
}

// Imported by the webhook handler: only poll when started directly
if (require.main === module) {
  main().catch((err: unknown) => {
    console.error('[bot] Failed to start', err);
    process.exit(1);
  });
}
