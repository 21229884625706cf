#!/usr/bin/env tsx
import { readFileSync } from 'node:fs';

import { runLevelSim } from './level-sim.js';

runLevelSim(process.argv, {
  readFile: (path) => readFileSync(path, 'utf8'),
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
}).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  },
);
