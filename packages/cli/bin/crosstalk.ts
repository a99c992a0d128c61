#!/usr/bin/env node

import { readFileSync } from 'node:fs';
import { buildProgram } from '../src/program.js';

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
  if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

await buildProgram({ version: readVersion() }).parseAsync();
