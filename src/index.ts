#!/usr/bin/env node
import { runScan } from "./app";
import { createProgram, toRunOptions } from "./cli";
import { AppError, errorMessage, isUserError } from "./errors";

async function main(): Promise<void> {
  const program = createProgram(async (options) => {
    const result = await runScan(toRunOptions(options));
    console.log(`Scan report written to: ${result.reportPath}`);
  });

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    if (err instanceof AppError && err.details) {
      console.error(
        `  Details: ${typeof err.details === "string" ? err.details : JSON.stringify(err.details, null, 2)}`
      );
    }

    const verbose = program.opts<{ verbose?: boolean }>().verbose;
    if (verbose && err instanceof Error && err.stack) {
      console.error(`\nStack Trace:\n${err.stack}`);
    }

    process.exitCode = isUserError(err) ? 2 : 1;
  }
}

void main();
