/**
 * Resolve words through the configured dictionary.
 *
 * Usage: npx tsx src/cli/lookup.ts <config.json> <word> [word...]
 */
import { UnitManager } from '../acoustic/unitManager.js';
import { loadDictionaryConfig, toDictionaryOptions } from '../config/loader.js';
import { FullDictionary } from '../dictionary/FullDictionary.js';
import { createConsoleLogger } from '../log.js';

async function main() {
  const [configPath, ...words] = process.argv.slice(2);
  if (!configPath || words.length === 0) {
    console.error('Usage: npx tsx src/cli/lookup.ts <config.json> <word> [word...]');
    process.exit(1);
  }

  try {
    const loaded = await loadDictionaryConfig(configPath);
    const dictionary = new FullDictionary(toDictionaryOptions(loaded, new UnitManager(), createConsoleLogger()));
    await dictionary.allocate();

    let missing = 0;
    for (const text of words) {
      const word = dictionary.getWord(text);
      if (!word) {
        missing++;
        console.log(`${text.toLowerCase()}: NOT FOUND`);
        continue;
      }
      console.log(`${word.spelling}${word.isFiller ? ' [filler]' : ''}`);
      for (const p of word.pronunciations) {
        console.log(`  ${p.units.join(' ')}`);
      }
    }
    if (missing > 0) process.exitCode = 2;
  } catch (err) {
    console.error('Error:', err);
    process.exit(1);
  }
}

main().catch(console.error);
