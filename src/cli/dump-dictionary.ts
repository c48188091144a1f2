import { UnitManager } from '../acoustic/unitManager.js';
import { configPathFromEnv, loadDictionaryConfig, toDictionaryOptions } from '../config/loader.js';
import { FullDictionary } from '../dictionary/FullDictionary.js';
import { createConsoleLogger } from '../log.js';

async function main() {
  const configPath = process.argv[2] ?? configPathFromEnv();
  console.error(`Loading dictionary config from: ${configPath}`);

  try {
    const loaded = await loadDictionaryConfig(configPath);
    const dictionary = new FullDictionary(toDictionaryOptions(loaded, new UnitManager(), createConsoleLogger('dictionary', { stderr: true })));
    await dictionary.allocate();

    console.error(`=== ${dictionary.getWordCount()} words, ${dictionary.getFillerCount()} fillers ===`);
    process.stdout.write(dictionary.dumpToString());
    dictionary.deallocate();
  } catch (err) {
    console.error('Error loading dictionary:', err);
    process.exit(1);
  }
}

main().catch(console.error);
