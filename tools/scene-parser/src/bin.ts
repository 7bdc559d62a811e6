#!/usr/bin/env -S npx tsx
import { runSceneParserCli } from './cli.js';

process.exitCode = await runSceneParserCli(process.argv.slice(2), {
  print: (text) => console.log(text),
  printError: (text) => console.error(text),
});
