import chalk from 'chalk';

const PREFIX = '[commitment]';

export const isDebug = (): boolean => process.env.COMMITMENT_DEBUG === 'true';

export const errorMessage = (e: unknown): string => (e instanceof Error ? e.message : String(e));

export function debug(scope: string, ...parts: unknown[]) {
  if (!isDebug()) return;
  console.error(chalk.dim(`${PREFIX}[${scope}]`), ...parts);
}

export function warn(scope: string, ...parts: unknown[]) {
  console.error(chalk.yellow(`${PREFIX}[${scope}]`), ...parts);
}

export function error(scope: string, ...parts: unknown[]) {
  console.error(chalk.red(`${PREFIX}[${scope}]`), ...parts);
}
