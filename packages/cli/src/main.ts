#!/usr/bin/env node
import { run } from './program';

async function main() {
  process.exitCode = await run(process.argv.slice(2));
}

void main();
