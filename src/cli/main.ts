#!/usr/bin/env node
import { runProgram } from './program';

void runProgram(process.argv.slice(2), {
  stdin: process.stdin,
  stdout: process.stdout,
  env: process.env,
}).then((exitCode) => {
  process.exitCode = exitCode;
});
