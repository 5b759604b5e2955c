import chalk from 'chalk';

export function header(text = 'commitment') {
  console.log('\n┌ ' + chalk.bold(text));
}

export function borderLine(content?: string) {
  if (!content) console.log('│');
  else console.log('│ ' + content);
}

export function sectionTitle(label: string) {
  console.log('⊙ ' + chalk.bold(label));
}

export function field(label: string, value: string) {
  borderLine(chalk.dim(label.padEnd(14)) + ' ' + value);
}

export const yesNo = (v: boolean, good = true) =>
  v === good ? chalk.green(v ? 'yes' : 'no') : chalk.red(v ? 'yes' : 'no');

export function footer(message: string) {
  console.log('└ ' + message);
  console.log();
}
