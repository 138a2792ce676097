#!/usr/bin/env node

import 'module-alias/register';
import '../pre-start'; // Must be the first import
import { runCli } from '../cli';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
