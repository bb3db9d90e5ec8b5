#!/usr/bin/env node
import { runList } from '../cli/list';

void runList(process.argv.slice(2)).then(code => {
  process.exitCode = code;
});
