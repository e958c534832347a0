#!/usr/bin/env node
import 'dotenv/config';
import { run } from './cli/program';
import { formatErrorChain } from './services/base/errors';

run(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    process.stderr.write(`Error: ${formatErrorChain(error)}\n`);
    process.exitCode = 1;
  });
