#!/usr/bin/env node
/**
 * Tag-tree tools - CLI Interface
 *
 * Command-line interface for decoding tag-tree containers and running the
 * rotor cipher and mesh hash over single files.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { ARCHIVE_ROTOR_KEY, ROTOR_KEY_ENV } from './constants/format.js';
import { formatHash, meshHash } from './mesh-hash.js';
import { RotorCipher } from './rotor-cipher.js';
import { isRotorPayload, unpackRotorPayload } from './rotor-payload.js';
import { TagTreeBinary } from './tag-tree.js';
import { exportXml } from './xml-export.js';

const program = new Command();

// Version is set at build time
const version = '0.1.0';

function keyOption(): Option {
  return new Option('-k, --key <key>', 'Rotor cipher key').env(ROTOR_KEY_ENV).makeOptionMandatory();
}

function fail(action: string, error: unknown): never {
  console.error(`❌ ${action} failed:`, error instanceof Error ? error.message : String(error));
  process.exit(1);
}

function parseIndent(value: string): number {
  const spaces: number = Number.parseInt(value, 10);
  if (!Number.isInteger(spaces) || spaces < 0 || String(spaces) !== value.trim()) {
    throw new InvalidArgumentError('Indent must be a non-negative integer.');
  }
  return spaces;
}

program
  .name('tagtree')
  .description('Tag-tree container decoder with rotor cipher and mesh hash tooling')
  .version(version);

program
  .command('decode')
  .description('Decode a tag-tree container and print it as XML')
  .argument('<input-file>', 'Path to the tag-tree file')
  .option('-o, --output <file>', 'Write the XML here instead of stdout')
  .option('--strict', 'Reject files with unfilled child slots', false)
  .option('--indent <spaces>', 'Spaces per nesting level', parseIndent, 4)
  .action(async (inputFile: string, options: { output?: string; strict: boolean; indent: number }) => {
    try {
      const buffer: Buffer = await readFile(resolve(inputFile));
      const decoded = TagTreeBinary.decode({ buffer, strict: options.strict });
      const xml: string = exportXml(decoded.roots, { indent: options.indent });

      if (options.output) {
        await writeFile(resolve(options.output), xml, 'utf8');
        console.log(`Decoded ${decoded.tags.length} elements (${decoded.roots.length} roots) to: ${options.output}`);
      } else {
        process.stdout.write(xml);
      }
    } catch (error) {
      fail('Decode', error);
    }
  });

program
  .command('info')
  .description('Print the header of a tag-tree container')
  .argument('<input-file>', 'Path to the tag-tree file')
  .action(async (inputFile: string) => {
    try {
      const buffer: Buffer = await readFile(resolve(inputFile));
      const header = TagTreeBinary.readHeader({ buffer });
      console.log(`Kind: ${TagTreeBinary.detectKind({ buffer }) ?? 'not a tag tree'}`);
      console.log(`Declared size: ${header.declaredSize} (actual ${buffer.length})`);
      console.log(`Element names: ${header.elementNames.length}`);
      console.log(`Attribute names: ${header.attributeNames.length}`);
      console.log(`Tags: ${header.tagCount}`);
    } catch (error) {
      fail('Info', error);
    }
  });

program
  .command('hash')
  .description('Print the mesh hash of each name')
  .argument('<names...>', 'Resource names to hash')
  .action((names: string[]) => {
    for (const name of names) {
      console.log(`${formatHash(meshHash(name))}\t${name}`);
    }
  });

program
  .command('encrypt')
  .description('Rotor-encrypt a file')
  .argument('<input-file>', 'Plaintext file')
  .argument('<output-file>', 'Where the ciphertext is written')
  .addOption(keyOption())
  .action(async (inputFile: string, outputFile: string, options: { key: string }) => {
    try {
      const data: Buffer = await readFile(resolve(inputFile));
      await writeFile(resolve(outputFile), new RotorCipher(options.key).encrypt(data));
      console.log(`✅ Encrypted ${data.length} bytes to: ${outputFile}`);
    } catch (error) {
      fail('Encrypt', error);
    }
  });

program
  .command('decrypt')
  .description('Rotor-decrypt a file')
  .argument('<input-file>', 'Ciphertext file')
  .argument('<output-file>', 'Where the plaintext is written')
  .addOption(keyOption())
  .action(async (inputFile: string, outputFile: string, options: { key: string }) => {
    try {
      const data: Buffer = await readFile(resolve(inputFile));
      await writeFile(resolve(outputFile), new RotorCipher(options.key).decrypt(data));
      console.log(`✅ Decrypted ${data.length} bytes to: ${outputFile}`);
    } catch (error) {
      fail('Decrypt', error);
    }
  });

program
  .command('unpack')
  .description('Unpack a rotor-wrapped archive entry')
  .argument('<input-file>', 'Rotor-wrapped entry')
  .argument('<output-file>', 'Where the unpacked bytes are written')
  .addOption(new Option('-k, --key <key>', 'Rotor cipher key (defaults to the archive key)').env(ROTOR_KEY_ENV))
  .action(async (inputFile: string, outputFile: string, options: { key?: string }) => {
    try {
      const data: Buffer = await readFile(resolve(inputFile));
      if (!isRotorPayload(data)) {
        console.warn('Input does not start with a rotor payload marker; unpacking anyway');
      }
      const unpacked: Buffer = unpackRotorPayload(data, options.key ?? ARCHIVE_ROTOR_KEY);
      await writeFile(resolve(outputFile), unpacked);
      console.log(`✅ Unpacked ${unpacked.length} bytes to: ${outputFile}`);
    } catch (error) {
      fail('Unpack', error);
    }
  });

await program.parseAsync();
