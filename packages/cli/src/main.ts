/**
 * @tally/cli — Entry point.
 *
 * Runs the CLI against the real process streams and sets the exit code.
 */

import chalk from "chalk";
import { runCli } from "./app.js";

runCli(process.argv.slice(2), {
  stdout: process.stdout,
  stderr: process.stderr,
  env: process.env,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(chalk.red("Fatal error:"), err);
    process.exit(1);
  });
