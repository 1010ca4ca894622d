
import chalk from "chalk";

export function logInfo(message: string) {
  console.log(chalk.cyan(`[Kiln] ${message}`));
}

export function logSuccess(message: string) {
  console.log(chalk.green(`[Kiln] ${message}`));
}

export function logWarn(message: string) {
  console.warn(chalk.yellow(`[Kiln] ${message}`));
}

export function logError(message: string, err?: unknown) {
  console.error(chalk.red(`[Kiln] ${message}`));
  if (err) console.error(err);
}

/** Verbose per-asset tracing, enabled with KILN_DEBUG=1. */
export function logDebug(message: string) {
  if (process.env.KILN_DEBUG !== "1") return;
  console.log(chalk.gray(`[Kiln] ${message}`));
}
