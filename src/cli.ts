#!/usr/bin/env node
/**
 * Asset container decoder - CLI Interface
 *
 * Command-line interface for dumping RMAN manifests and WAD archives as JSON.
 */

import { Command, Option } from 'commander';
import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { decodeAsset, type AssetFormat } from './asset-format.js';
import { stringifyDocument } from './utils/json-document.js';

interface OutputOptions {
  readonly output?: string;
  readonly compact?: boolean;
}

interface InspectOptions extends OutputOptions {
  readonly format?: AssetFormat;
}

const program = new Command();

// Version is set at build time
const version = '0.1.0';

async function dump(label: string, inputFile: string, format: AssetFormat | undefined, options: OutputOptions): Promise<void> {
  try {
    const buffer: Buffer = await readFile(resolve(inputFile));
    const decoded = decodeAsset({ buffer, format });
    const json: string = stringifyDocument(decoded.file, { compact: options.compact });

    if (options.output) {
      const outputFile: string = resolve(options.output);
      await writeFile(outputFile, `${json}\n`);
      console.log(`✅ Decoded ${decoded.format.toUpperCase()} written to: ${outputFile}`);
    } else {
      console.log(json);
    }
  } catch (error) {
    console.error(`❌ ${label} failed:`, error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

program
  .name('asset-decode')
  .description('Decode RMAN release manifests and WAD asset archives to JSON')
  .version(version);

program
  .command('rman')
  .description('Decode an RMAN release manifest')
  .argument('<input-file>', 'Path to the .manifest file')
  .option('-o, --output <file>', 'Write JSON to a file instead of stdout')
  .option('--compact', 'Emit JSON without indentation')
  .action(async (inputFile: string, options: OutputOptions) => {
    await dump('RMAN decode', inputFile, 'rman', options);
  });

program
  .command('wad')
  .description('Decode a WAD archive table of contents')
  .argument('<input-file>', 'Path to the .wad file')
  .option('-o, --output <file>', 'Write JSON to a file instead of stdout')
  .option('--compact', 'Emit JSON without indentation')
  .action(async (inputFile: string, options: OutputOptions) => {
    await dump('WAD decode', inputFile, 'wad', options);
  });

program
  .command('inspect')
  .description('Detect the container format from its magic and decode it')
  .argument('<input-file>', 'Path to an RMAN or WAD file')
  .addOption(new Option('-f, --format <format>', 'Force a container format').choices(['rman', 'wad']))
  .option('-o, --output <file>', 'Write JSON to a file instead of stdout')
  .option('--compact', 'Emit JSON without indentation')
  .action(async (inputFile: string, options: InspectOptions) => {
    await dump('Inspect', inputFile, options.format, options);
  });

await program.parseAsync();
