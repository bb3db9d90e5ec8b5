#!/usr/bin/env node
import { runWatch } from '../cli/watch';

void runWatch(process.argv.slice(2)).then(code => {
  process.exit(code);
});
