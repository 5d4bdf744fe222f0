#!/usr/bin/env node
import { main } from './index.js';

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  },
);
