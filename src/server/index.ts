import { createServer } from 'node:http';
import { UnitManager } from '../acoustic/unitManager.js';
import { configPathFromEnv, loadDictionaryConfig, toDictionaryOptions } from '../config/loader.js';
import { FullDictionary } from '../dictionary/FullDictionary.js';
import { createConsoleLogger } from '../log.js';
import { createApp } from './app.js';

async function main() {
  const configPath = configPathFromEnv();
  console.log(`[boot] DICTIONARY_CONFIG = ${configPath}`);

  const loaded = await loadDictionaryConfig(configPath);
  const dictionary = new FullDictionary(toDictionaryOptions(loaded, new UnitManager(), createConsoleLogger()));
  await dictionary.allocate();

  const server = createServer(createApp(dictionary));
  const port = Number(process.env.PORT ?? 4321);
  server.listen(port, () => {
    console.log(`Dictionary service running at http://localhost:${port}`);
  });

  const shutdown = () => {
    server.close(() => {
      dictionary.deallocate();
      process.exit(0);
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err) => {
  console.error('[boot] Failed to start:', err);
  process.exit(1);
});
