import path from 'path';
import { createConsoleLogger } from '../src/lib/consolidator-logger';
import { findDefaultCellMap } from '../src/lib/consolidator-settings';
import { formatProgressEvent } from '../src/lib/excel-consolidation-progress';
import { ExcelConsolidator } from '../src/lib/excel-consolidator';
import type { ConsolidatorConfigInput } from '../src/lib/consolidator-settings';

const USAGE =
  'Usage: npm run consolidate -- --consolidation <file.xlsx> [--cell-map <file.xlsx>] [--sheet <name>] ' +
  '[--header-row <n>] [--data-start-row <n>] [--keep-existing] [--max-file-size-mb <n>] <estimate.xlsx>...';

const VALUE_FLAGS = new Set([
  '--cell-map',
  '--consolidation',
  '--sheet',
  '--header-row',
  '--data-start-row',
  '--max-file-size-mb',
]);

export type CliArgs = {
  options: Map<string, string>;
  keepExisting: boolean;
  estimateFiles: string[];
};

export function parseCliArgs(argv: string[]): CliArgs {
  const options = new Map<string, string>();
  const estimateFiles: string[] = [];
  let keepExisting = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--keep-existing') {
      keepExisting = true;
    } else if (VALUE_FLAGS.has(arg)) {
      const value = argv[i + 1];
      if (value === undefined || !value.trim()) {
        throw new Error(`Missing value for ${arg}.\n${USAGE}`);
      }
      options.set(arg, value.trim());
      i++;
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option ${arg}.\n${USAGE}`);
    } else {
      estimateFiles.push(arg);
    }
  }

  return { options, keepExisting, estimateFiles };
}

function parseInteger(value: string | undefined, name: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${name} must be a whole number, got "${value}".`);
  }
  return parsed;
}

export async function buildConfigInput(args: CliArgs, cwd: string): Promise<ConsolidatorConfigInput> {
  const consolidationPath = args.options.get('--consolidation');
  if (!consolidationPath) {
    throw new Error(USAGE);
  }

  const cellMapPath = args.options.get('--cell-map') ?? (await findDefaultCellMap([cwd])) ?? '';
  return {
    cellMapPath,
    consolidationPath,
    consolidationSheetName: args.options.get('--sheet'),
    headerRow: parseInteger(args.options.get('--header-row'), 'Header row'),
    dataStartRow: parseInteger(args.options.get('--data-start-row'), 'Data start row'),
    clearExistingData: !args.keepExisting,
    maxFileSizeMb: parseInteger(args.options.get('--max-file-size-mb'), 'Max file size'),
  };
}

async function main() {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.estimateFiles.length === 0) {
    throw new Error(`Please add at least one estimate spreadsheet.\n${USAGE}`);
  }

  const logger = createConsoleLogger('consolidate');
  const consolidator = await ExcelConsolidator.create(await buildConfigInput(args, process.cwd()), { logger });
  const outputPath = await consolidator.consolidate(args.estimateFiles, event => {
    console.log(formatProgressEvent(event));
  });

  console.log(JSON.stringify({ outputPath, outputDir: path.dirname(outputPath) }, null, 2));
}

if (require.main === module) {
  main().catch(error => {
    console.error(error instanceof Error ? `Error: ${error.message}` : error);
    process.exit(1);
  });
}
