/**
 * Command-line interface.
 *
 * Usage:
 *   wechat-article convert <file> [--theme <name>] [--mode news|newspic] [--out <file>] [--json]
 *   wechat-article publish <file...> [--theme <name>] [--mode news|newspic] [--author <name>]
 *                                    [--cover <image>] [--source-url <url>] [--comments]
 *                                    [--fans-only] [--concurrency <n>]
 *   wechat-article themes
 *   wechat-article help
 */

import * as fs from 'node:fs';
import { readFile } from 'node:fs/promises';
import * as path from 'node:path';

import { loadConfig } from './config';
import { convert } from './converter';
import { isArticleMode } from './core/context';
import { DEFAULT_THEME, THEMES, listThemes } from './core/themes';
import type { ArticleMode } from './core/types';
import { BatchPublisher } from './wechat-api/batch';
import type { BatchItem } from './wechat-api/batch';
import { WeChatClient } from './wechat-api/client';
import { ArticlePublisher } from './wechat-api/publisher';

export const PREFIX = '[wechat-article]';

export const USAGE = `Usage: wechat-article <command> [options]

Commands:
  convert <file>      Convert a Markdown or HTML file and print the HTML
  publish <file...>   Convert files and create WeChat drafts
  themes              List available themes
  help                Show this message

Options:
  --theme <name>      Theme (default: ${DEFAULT_THEME})
  --mode <mode>       news or newspic (default: news)
  --out <file>        convert: write the HTML to a file
  --json              convert: print the full result as JSON
  --author <name>     publish: article author
  --cover <image>     publish: cover image path or URL
  --source-url <url>  publish: "read more" link
  --comments          publish: open comments
  --fans-only         publish: only followers may comment
  --concurrency <n>   publish: documents in flight at once (default: 3)

Credentials are read from WECHAT_APPID and WECHAT_APP_SECRET, in the
environment or a .env file.`;

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliFlags {
  theme?: string;
  mode?: ArticleMode;
  out?: string;
  json: boolean;
  author?: string;
  cover?: string;
  sourceUrl?: string;
  comments: boolean;
  fansOnly: boolean;
  concurrency?: number;
}

export type CliCommand =
  | { command: 'convert'; file: string; flags: CliFlags }
  | { command: 'publish'; files: string[]; flags: CliFlags }
  | { command: 'themes' }
  | { command: 'help' };

const VALUE_FLAGS = new Set(['--theme', '--mode', '--out', '--author', '--cover', '--source-url', '--concurrency']);

/** @throws {UsageError} on unknown commands, unknown flags or missing values. */
export function parseArgs(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;
  if (command === undefined || command === 'help' || command === '--help' || command === '-h') {
    return { command: 'help' };
  }
  if (command === 'themes') {
    return { command: 'themes' };
  }
  if (command !== 'convert' && command !== 'publish') {
    throw new UsageError(`Unknown command "${command}"`);
  }

  const flags: CliFlags = { json: false, comments: false, fansOnly: false };
  const files: string[] = [];

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (!arg.startsWith('--')) {
      files.push(arg);
      continue;
    }

    if (arg === '--json') flags.json = true;
    else if (arg === '--comments') flags.comments = true;
    else if (arg === '--fans-only') flags.fansOnly = true;
    else if (VALUE_FLAGS.has(arg)) {
      const value = rest[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new UsageError(`${arg} needs a value`);
      }
      i++;
      applyValueFlag(flags, arg, value);
    } else {
      throw new UsageError(`Unknown option "${arg}"`);
    }
  }

  if (files.length === 0) {
    throw new UsageError(`${command} needs at least one file`);
  }
  if (command === 'convert') {
    if (files.length > 1) throw new UsageError('convert takes exactly one file');
    return { command, file: files[0], flags };
  }
  return { command, files, flags };
}

function applyValueFlag(flags: CliFlags, flag: string, value: string): void {
  switch (flag) {
    case '--theme':
      flags.theme = value;
      break;
    case '--mode':
      if (!isArticleMode(value)) throw new UsageError(`--mode must be "news" or "newspic", got "${value}"`);
      flags.mode = value;
      break;
    case '--out':
      flags.out = value;
      break;
    case '--author':
      flags.author = value;
      break;
    case '--cover':
      flags.cover = value;
      break;
    case '--source-url':
      flags.sourceUrl = value;
      break;
    case '--concurrency': {
      const n = Number(value);
      if (!Number.isInteger(n) || n < 1) throw new UsageError(`--concurrency must be a positive integer, got "${value}"`);
      flags.concurrency = n;
      break;
    }
  }
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

export interface CliEnvironment {
  cwd?: string;
  env?: Readonly<Record<string, string | undefined>>;
  fetch?: typeof fetch;
}

function listThemesCommand(): number {
  for (const name of listThemes()) {
    const theme = THEMES[name];
    console.log(`${name.padEnd(14)} ${theme.label}  ${theme.description}`);
  }
  return 0;
}

function convertCommand(file: string, flags: CliFlags, cwd: string): number {
  const filePath = path.resolve(cwd, file);
  const result = convert({
    source: fs.readFileSync(filePath, 'utf8'),
    theme: flags.theme,
    mode: flags.mode,
    inputFormat: path.basename(filePath),
  });

  for (const warning of result.warnings) {
    console.error(`${PREFIX} warning: ${warning.message}`);
  }

  if (flags.json) {
    console.log(JSON.stringify(result, null, 2));
  } else if (flags.out) {
    const outPath = path.resolve(cwd, flags.out);
    fs.writeFileSync(outPath, result.html, 'utf8');
    console.log(`${PREFIX} Wrote ${outPath} ("${result.title}")`);
  } else {
    console.log(result.html);
  }
  return 0;
}

async function publishCommand(files: string[], flags: CliFlags, environment: CliEnvironment): Promise<number> {
  const cwd = environment.cwd ?? process.cwd();
  const config = loadConfig({ env: environment.env, cwd });
  const theme = flags.theme ?? config.theme;
  const mode = flags.mode ?? config.mode;
  const author = flags.author ?? config.author;

  const client = new WeChatClient({ appId: config.appId, appSecret: config.appSecret, fetch: environment.fetch });
  const publisher = new ArticlePublisher(client, environment.fetch ? { fetch: environment.fetch } : {});
  const batch = new BatchPublisher(publisher);

  const items: BatchItem[] = files.map((file) => {
    const filePath = path.resolve(cwd, file);
    return {
      name: file,
      convert: async () => ({
        source: await readFile(filePath, 'utf8'),
        theme,
        mode,
        inputFormat: path.basename(filePath),
      }),
      publish: {
        mode,
        author,
        coverImage: flags.cover,
        sourceUrl: flags.sourceUrl,
        commentEnabled: flags.comments,
        fansOnlyComment: flags.fansOnly,
        baseDir: path.dirname(filePath),
      },
    };
  });

  const summary = await batch.publishAll(items, {
    concurrency: flags.concurrency,
    onProgress: (progress) => {
      console.log(`${PREFIX} [${progress.current}/${progress.total}] ${progress.message}`);
    },
  });

  for (const result of summary.results) {
    if (result.success) {
      console.log(`${PREFIX} ${result.name}: draft ${result.mediaId} ("${result.title}")`);
    } else {
      console.error(`${PREFIX} ${result.name}: ${result.code}: ${result.error}`);
    }
  }
  console.log(`${PREFIX} ${summary.succeeded} published, ${summary.failed} failed`);
  return summary.failed > 0 ? 1 : 0;
}

/**
 * Run the CLI with `argv` (without the node and script entries) and return
 * the exit code.
 */
export async function run(argv: readonly string[], environment: CliEnvironment = {}): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    switch (parsed.command) {
      case 'help':
        console.log(USAGE);
        return 0;
      case 'themes':
        return listThemesCommand();
      case 'convert':
        return convertCommand(parsed.file, parsed.flags, environment.cwd ?? process.cwd());
      case 'publish':
        return await publishCommand(parsed.files, parsed.flags, environment);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`${PREFIX} Error: ${message}`);
    if (error instanceof UsageError) {
      console.error(USAGE);
    }
    return 1;
  }
}
