#!/usr/bin/env node
import { run } from './cli';

run(process.argv.slice(2))
  .then((code) => {
    // let stdout drain instead of calling process.exit
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
