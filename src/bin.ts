#!/usr/bin/env node
import path from 'path';
import { run } from './cli';

const invokedAs = path.parse(process.argv[1] ?? 'noderange').name;
process.exitCode = run(process.argv.slice(2), invokedAs);
