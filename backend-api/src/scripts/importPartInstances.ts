import { isDocumentStoreError, JsonFileDocumentStore } from '@turbinetrack/store';

import { loadConfig } from '../config.js';
import { importPartInstancesFromFile } from '../services/importService.js';
import { openSession } from '../services/session.js';

function parseArgs(argv: string[]) {
  const args: Record<string, string> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a.startsWith('--')) {
      const k = a.slice(2);
      const v = argv[i + 1];
      if (v && !v.startsWith('--')) {
        args[k] = v;
        i++;
      } else {
        args[k] = 'true';
      }
    }
  }
  return args;
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const file = String(args.file ?? '').trim();
  if (!file) {
    console.error('Usage: npm run import -- --file <parts.csv|parts.xlsx> [--data <data.json>]');
    process.exitCode = 2;
    return;
  }

  const dataFile = String(args.data ?? '').trim() || loadConfig().dataFile;
  const session = openSession(new JsonFileDocumentStore(dataFile));
  const summary = await importPartInstancesFromFile(session, file);

  if (summary.error) {
    console.error(`Import failed: ${summary.error}`);
    process.exitCode = 1;
    return;
  }
  for (const e of summary.errors) console.warn(`row ${e.row}: ${e.error}`);
  console.log(`Imported ${summary.added} part instance(s) into ${dataFile}, ${summary.failed} row(s) rejected.`);
}

main().catch((e: unknown) => {
  console.error(isDocumentStoreError(e) ? `${e.code}: ${e.message}` : e);
  process.exitCode = 1;
});
