import { Cli, Command, Option } from 'clipanion';
import { loadConfig, loadConfigDetailed, CONFIG_KEYS } from './config.js';
import { runBridge } from './nvim/bridge.js';
import { runCheck } from './workflow/check.js';
import { errorMessage } from './log.js';
import pkgJson from '../package.json' with { type: 'json' };

const pkgVersion = pkgJson.version || '0.0.0';

export class AttachCommand extends Command {
  static paths = [[], [`attach`]];
  static usage = Command.Usage({
    description: 'Attach to a running Neovim and watch writes (default command).',
    details: `Connects to the Neovim RPC socket (\`$NVIM\` unless --socket is given), installs the commitment autocommands and runs until the editor exits. Start it from Neovim with \`vim.fn.jobstart({ "commitment", "attach" })\`; the job inherits \`$NVIM\`.`,
    examples: [
      ['Attach from inside Neovim', 'commitment'],
      ['Attach to a specific socket', 'commitment attach --socket /tmp/nvim.sock'],
    ],
  });

  socket = Option.String('--socket', {
    required: false,
    description: 'Neovim RPC socket path (defaults to $NVIM)',
  });

  async execute() {
    const socket = this.socket || process.env.NVIM;
    if (!socket) {
      this.context.stderr.write('No Neovim socket: pass --socket or run from inside Neovim.\n');
      return 1;
    }
    try {
      await runBridge({ socket });
    } catch (e) {
      this.context.stderr.write(`Failed to attach to ${socket}: ${errorMessage(e)}\n`);
      return 1;
    }
    return 0;
  }
}

export class CheckCommand extends Command {
  static paths = [[`check`]];
  static usage = Command.Usage({
    description: 'Report what commitment thinks of the current repository.',
    details:
      'Runs one gate evaluation: clean tree, last commit subject, whether it is on the useless list and whether writes would be blocked. With a path, also reports whether that file has uncommitted changes.',
    examples: [
      ['Check the repository', 'commitment check'],
      ['Check a single file too', 'commitment check src/index.ts'],
    ],
  });

  file = Option.String({ required: false });

  async execute() {
    try {
      const config = await loadConfig();
      const report = await runCheck(config, this.file);
      return report.repository ? 0 : 1;
    } catch (e) {
      this.context.stderr.write(`Check failed: ${errorMessage(e)}\n`);
      return 1;
    }
  }
}

export class ConfigShowCommand extends Command {
  static paths = [[`config`, `show`]];
  static usage = Command.Usage({
    description: 'Print every commitment setting and the layer it came from.',
    details:
      'Lists each option after the global file, project file and COMMITMENT_* variables are applied, followed by the layer that set it. Editor overrides from vim.g.commitment are not visible here. --json prints the merged object, its _sources map and the raw project config.',
    examples: [
      ['Human readable', 'commitment config show'],
      ['JSON with sources', 'commitment config show --json'],
    ],
  });
  json = Option.Boolean('--json', false, { description: 'Print JSON with the _sources map' });

  async execute() {
    const { config, raw } = await loadConfigDetailed();
    if (this.json) {
      this.context.stdout.write(JSON.stringify({ config, raw }, null, 2) + '\n');
      return;
    }
    const lines = CONFIG_KEYS.map(
      (k) => `${k} = ${JSON.stringify(config[k])}  (${config._sources[k]})`,
    );
    this.context.stdout.write(lines.join('\n') + '\n');
  }
}

export class ConfigGetCommand extends Command {
  static paths = [[`config`, `get`]];
  static usage = Command.Usage({
    description: 'Print one commitment setting.',
    details: 'Prints the value as JSON, for use in scripts. --with-source appends the layer that set it.',
    examples: [
      ['Get the write threshold', 'commitment config get writes_number'],
      ['Get with source', 'commitment config get prevent_write --with-source'],
    ],
  });
  key = Option.String();
  withSource = Option.Boolean('--with-source', false, { description: 'Append the layer that set the value' });

  async execute() {
    const { config } = await loadConfigDetailed();
    const key = CONFIG_KEYS.find((k) => k === this.key);
    if (!key) {
      this.context.stderr.write(`Unknown config key: ${this.key}\n`);
      return 1;
    }
    const value = JSON.stringify(config[key]);
    this.context.stdout.write(this.withSource ? `${value} (${config._sources[key]})\n` : `${value}\n`);
    return 0;
  }
}

export class VersionCommand extends Command {
  static paths = [[`--version`], [`-V`]];
  async execute() {
    this.context.stdout.write(`${pkgVersion}\n`);
  }
}

export function buildCli(): Cli {
  const cli = new Cli({
    binaryLabel: 'commitment',
    binaryName: 'commitment',
    binaryVersion: pkgVersion,
  });
  cli.register(AttachCommand);
  cli.register(CheckCommand);
  cli.register(ConfigShowCommand);
  cli.register(ConfigGetCommand);
  cli.register(VersionCommand);
  return cli;
}
