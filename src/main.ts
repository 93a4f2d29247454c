import { ConfigError, loadConfig } from './config';
import { createApp } from './server/app';
import { Storage } from './services/storage';

async function main(): Promise<void> {
  const config = loadConfig();
  const storage = new Storage(config.outputFolder);
  await storage.init();

  const app = createApp({ storage, config, logRequests: true });
  app.listen(config.port, () => {
    console.log(`[Gateway] Listening on port ${config.port}, storing files in ${storage.root}`);
  });
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error('[Gateway] Failed to start:', error);
  }
  process.exit(1);
});
