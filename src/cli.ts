#!/usr/bin/env node

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import process from 'process';
import ora from 'ora';
import { z } from 'zod';
import { FileConfigStore } from './config/store.js';
import { GitService } from './services/git.js';
import { AIService } from './services/ai.js';
import { CONFIG_FILE } from './constants/config.js';
import { run, type CliDependencies } from './program.js';

const PackageJsonSchema = z.object({ version: z.string() });

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson = PackageJsonSchema.parse(
  JSON.parse(readFileSync(join(__dirname, '../package.json'), 'utf-8'))
);

const dependencies: CliDependencies = {
  version: packageJson.version,
  output: {
    log: (message = '') => console.log(message),
    error: (message) => console.error(message),
  },
  env: process.env,
  spinner: (text) => ora(text),
  modelClient: new AIService(process.env),
  openRepository: () => GitService.open(process.cwd()),
  openStore: (root) => new FileConfigStore(join(root, CONFIG_FILE)),
};

process.exitCode = await run(process.argv.slice(2), dependencies);
