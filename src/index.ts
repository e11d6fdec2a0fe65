#!/usr/bin/env node
import 'dotenv/config';
import { main } from './cli.js';

main()
  .then(code => { process.exitCode = code; })
  .catch(err => {
    console.error('[fatal]', err);
    process.exitCode = 1;
  });
