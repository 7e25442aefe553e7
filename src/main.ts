#!/usr/bin/env node
/**
 * Entry point for the weather CLI
 */
import { main } from './cli';

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('Unexpected error:', err);
    process.exitCode = 1;
  });
