#!/usr/bin/env node
import { buildProgram } from './cli';
import { extractErrorMessage } from './errors';

export async function main(argv: string[] = process.argv): Promise<void> {
  await buildProgram().parseAsync(argv);
}

/** Runs the CLI, reporting any failure on stderr with exit code 1. */
export async function run(argv: string[] = process.argv): Promise<void> {
  try {
    await main(argv);
  } catch (error) {
    console.error(`Error: ${extractErrorMessage(error)}`);
    process.exitCode = 1;
  }
}

// Run if called directly
if (require.main === module) {
  void run();
}
