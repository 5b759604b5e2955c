import chalk from 'chalk';
import ora from 'ora';
import type { CommitmentConfig } from '../config.js';
import { GitInspector } from '../git.js';
import { WriteGate } from '../gate.js';
import { DebouncedNotifier } from '../notifier.js';
import type { NotificationSink, RepositoryInspector, TickResult } from '../types.js';
import { header, borderLine, sectionTitle, field, yesNo, footer } from './ui.js';

export interface CheckReport {
  repository: boolean;
  result?: TickResult;
  blocksWrites: boolean;
  file?: { path: string; pending: boolean };
}

// The report prints the gate's message itself, so the notifier has nowhere to go.
const silentSink: NotificationSink = { notify: async () => {} };

/**
 * One gate evaluation against the current repository, as the editor would
 * see it on the next save.
 */
export async function inspectRepository(
  config: CommitmentConfig,
  inspector: RepositoryInspector,
  path?: string,
): Promise<CheckReport> {
  if (!(await inspector.isRepository())) return { repository: false, blocksWrites: false };
  const gate = new WriteGate(config, inspector, new DebouncedNotifier(silentSink));
  const trigger = config.check_interval === -1 ? 'save' : 'interval';
  const result = await gate.tick(trigger);
  const file = path ? { path, pending: await inspector.fileHasPendingChanges(path) } : undefined;
  return { repository: true, result, blocksWrites: gate.blocksWrites(), file };
}

export async function runCheck(config: CommitmentConfig, path?: string, cwd = process.cwd()) {
  const spinner = ora({ text: chalk.bold('Inspecting repository'), spinner: 'dots' }).start();
  let report: CheckReport;
  try {
    report = await inspectRepository(config, GitInspector.forDirectory(cwd), path);
  } finally {
    spinner.stop();
  }

  header();
  if (!report.repository || !report.result) {
    footer(chalk.yellow('Not inside a git repository; nothing to watch.'));
    return report;
  }
  const { result } = report;
  sectionTitle('Repository');
  field('clean tree', yesNo(result.clean));
  field('last commit', result.subject ? JSON.stringify(result.subject) : chalk.dim('(none)'));
  field('useless', yesNo(result.useless, false));
  if (report.file) field(report.file.path, report.file.pending ? 'pending changes' : 'committed');
  borderLine();
  sectionTitle('Gate');
  field('locked', yesNo(result.state.locked, false));
  field('writes', report.blocksWrites ? chalk.red('blocked') : chalk.green('allowed'));
  borderLine();
  if (result.message) footer(chalk.yellow(result.message.replace(/\n/g, ' ')));
  else footer(chalk.green('Nothing to nag about.'));
  return report;
}
