#!/usr/bin/env tsx
/**
 * @apimeta/cli - Command line front end of the apimeta compiler
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { compileCommand } from './commands/compile.js';

// Read version from package.json
const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg: { version: string } = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));

const program = new Command();

program
  .name('apimeta')
  .description('Compile native API definition files to IL assembly text for ilasm')
  .version(pkg.version);

// `apimeta <input> <output>` runs compile
program.addCommand(compileCommand, { isDefault: true });

program.parse();
