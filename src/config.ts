import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { resolve, join } from 'node:path';
import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { debug, errorMessage } from './log.js';

const NotifySchema = z.object({
  level: z.enum(['info', 'warn', 'error']),
  title: z.string(),
});

export const ConfigSchema = z.object({
  message: z.string(),
  message_write_prevent: z.string(),
  message_useless_commit: z.string(),
  prevent_write: z.boolean(),
  stop_on_useless_commit: z.boolean(),
  writes_number: z.number().int().positive(),
  check_interval: z
    .number()
    .int()
    .refine((v) => v === -1 || v > 0, { message: 'must be -1 or a positive number of minutes' }),
  notify: NotifySchema,
});

export type CommitmentConfig = z.infer<typeof ConfigSchema>;

export const CONFIG_KEYS = ConfigSchema.keyof().options;

export type ConfigSource = 'default' | 'global' | 'project' | 'env' | 'editor';

export interface CommitmentConfigWithMeta extends CommitmentConfig {
  _sources: Record<keyof CommitmentConfig, ConfigSource>;
}

export const DEFAULTS: CommitmentConfig = {
  message: "Don't forget to git commit!",
  message_write_prevent: 'You shall not write!',
  message_useless_commit: "That's not a very useful commit message, mind rephrasing it?",
  prevent_write: false,
  stop_on_useless_commit: false,
  writes_number: 30,
  check_interval: -1,
  notify: {
    level: 'warn',
    title: 'commitment',
  },
};

// Older configs used this name for prevent_write.
const ALIASES: Record<string, keyof CommitmentConfig> = {
  stop_on_write: 'prevent_write',
};

type PlainObject = Record<string, unknown>;

const isPlainObject = (v: unknown): v is PlainObject =>
  typeof v === 'object' && v !== null && !Array.isArray(v);

const normalizeAliases = (layer: PlainObject): PlainObject => {
  const out: PlainObject = {};
  for (const [key, value] of Object.entries(layer)) {
    const target = ALIASES[key];
    if (target) {
      if (!(target in layer)) out[target] = value;
      continue;
    }
    out[key] = value;
  }
  return out;
};

/**
 * Overlays `override` onto `base`, recursing into nested tables. Only keys
 * that exist in `base` are copied; everything else is collected in `ignored`
 * as a dotted path.
 */
export function overlay(
  base: PlainObject,
  override: unknown,
  ignored: string[] = [],
  prefix = '',
): PlainObject {
  const out: PlainObject = { ...base };
  if (!isPlainObject(override)) return out;
  for (const [key, value] of Object.entries(override)) {
    const path = prefix + key;
    if (!(key in base)) {
      ignored.push(path);
      continue;
    }
    if (value === undefined || value === null) continue;
    const current = base[key];
    out[key] = isPlainObject(current) ? overlay(current, value, ignored, path + '.') : value;
  }
  return out;
}

/**
 * Merges every layer over the defaults, lowest precedence first, and
 * validates the result.
 */
export function mergeConfig(...layers: unknown[]): CommitmentConfig {
  const ignored: string[] = [];
  let merged: PlainObject = { ...DEFAULTS };
  for (const layer of layers) {
    if (!isPlainObject(layer)) continue;
    merged = overlay(merged, normalizeAliases(layer), ignored);
  }
  if (ignored.length) debug('config', 'ignoring unknown keys:', ignored.join(', '));
  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid commitment config: ${detail}`);
  }
  return parsed.data;
}

export function getGlobalConfigPath(): string {
  const base = process.env.XDG_CONFIG_HOME || join(homedir(), '.config');
  return resolve(base, 'commitment', 'commitment.json');
}

function readGlobalConfig(): PlainObject {
  const path = getGlobalConfigPath();
  if (!existsSync(path)) return {};
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
    return isPlainObject(parsed) ? parsed : {};
  } catch (e) {
    debug('config', `failed to parse ${path}, ignoring:`, errorMessage(e));
    return {};
  }
}

const parseBool = (v: string) => /^(1|true|yes|on)$/i.test(v.trim());

export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): PlainObject {
  const envCfg: PlainObject = {};
  if (env.COMMITMENT_WRITES_NUMBER) envCfg.writes_number = parseInt(env.COMMITMENT_WRITES_NUMBER, 10);
  if (env.COMMITMENT_CHECK_INTERVAL)
    envCfg.check_interval = parseInt(env.COMMITMENT_CHECK_INTERVAL, 10);
  if (env.COMMITMENT_PREVENT_WRITE) envCfg.prevent_write = parseBool(env.COMMITMENT_PREVENT_WRITE);
  if (env.COMMITMENT_STOP_ON_USELESS_COMMIT)
    envCfg.stop_on_useless_commit = parseBool(env.COMMITMENT_STOP_ON_USELESS_COMMIT);
  return envCfg;
}

export async function loadConfig(cwd = process.cwd(), editor?: unknown): Promise<CommitmentConfig> {
  return (await loadConfigDetailed(cwd, editor)).config;
}

export async function loadConfigDetailed(
  cwd = process.cwd(),
  editor?: unknown,
): Promise<{
  config: CommitmentConfigWithMeta;
  raw: { global: PlainObject; project: PlainObject; env: PlainObject; editor: PlainObject };
}> {
  const globalCfg = readGlobalConfig();

  const explorer = cosmiconfig('commitment');
  const result = await explorer.search(cwd);
  const found: unknown = result?.config;
  const projectCfg: PlainObject = isPlainObject(found) ? found : {};

  const envCfg = readEnvConfig();
  const editorCfg: PlainObject = isPlainObject(editor) ? editor : {};

  const merged = mergeConfig(globalCfg, projectCfg, envCfg, editorCfg);

  const layers: Array<[ConfigSource, PlainObject]> = [
    ['global', normalizeAliases(globalCfg)],
    ['project', normalizeAliases(projectCfg)],
    ['env', envCfg],
    ['editor', normalizeAliases(editorCfg)],
  ];
  const sourceOf = (key: keyof CommitmentConfig): ConfigSource => {
    let src: ConfigSource = 'default';
    for (const [name, layer] of layers) {
      if (key in layer) src = name;
    }
    return src;
  };
  const _sources = {
    message: sourceOf('message'),
    message_write_prevent: sourceOf('message_write_prevent'),
    message_useless_commit: sourceOf('message_useless_commit'),
    prevent_write: sourceOf('prevent_write'),
    stop_on_useless_commit: sourceOf('stop_on_useless_commit'),
    writes_number: sourceOf('writes_number'),
    check_interval: sourceOf('check_interval'),
    notify: sourceOf('notify'),
  } satisfies CommitmentConfigWithMeta['_sources'];

  return {
    config: { ...merged, _sources },
    raw: { global: globalCfg, project: projectCfg, env: envCfg, editor: editorCfg },
  };
}
