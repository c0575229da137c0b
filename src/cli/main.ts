#!/usr/bin/env node
import { readlinePrompter, runInteractive } from './interactive';
import { runCli } from './meterCli';

const argv = process.argv.slice(2);

if (argv.length === 0) {
  runInteractive(readlinePrompter()).catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
} else {
  process.exitCode = runCli(argv);
}
