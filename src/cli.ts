import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import logger, { getAvailableLogLevels, getLogLevel, setLogLevel } from './logger.js';
import { loadConfigFromFile } from './config/index.js';
import { getEngineSettings } from './config/settings.js';
import { ConfigValidationError } from './fingerprinting/errors.js';
import { normalizeEventAttributes } from './fingerprinting/event.js';
import { FingerprintEngine, StaticConfigSource, serializeGroupingResult } from './fingerprinting/engine.js';
import type { FingerprintingConfig } from './types.js';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

type EvaluateCliArgs = {
  eventPath?: string;
  eventJson?: string;
  configPath?: string;
  help?: boolean;
  errors: string[];
};

const DEFAULT_IO: CliIo = { stdout: process.stdout, stderr: process.stderr };

const USAGE_LINES = [
  'Fingerprinting CLI',
  '',
  'Usage:',
  '  fingerprint evaluate <event-file> [--config path]  Evaluate an event JSON file against the rules',
  '  fingerprint evaluate --event <json> [--config path]  Evaluate an inline event',
  '  fingerprint validate [path]    Validate a rules file (defaults to the configured rules)',
  '  fingerprint rules [--config path]  List the active rules in order',
  '  fingerprint log-level          Get or set the active log level',
  '  fingerprint help               Show this help message'
];

const EVALUATE_USAGE = [
  'Fingerprinting evaluate command',
  '',
  'Usage:',
  '  fingerprint evaluate <event-file> [options]',
  '  fingerprint evaluate --event <json> [options]',
  '',
  'Options:',
  '  -e, --event <json>     Inline event attributes',
  '  -c, --config <path>    Rules file to evaluate against',
  '  -h, --help             Show this help message'
].join('\n');

const LOG_LEVEL_USAGE = [
  'Fingerprinting log level commands',
  '',
  'Usage:',
  '  fingerprint log-level            Show the current log level',
  '  fingerprint log-level get        Show the current log level',
  '  fingerprint log-level set <level>  Change the active log level',
  '  fingerprint log-level <level>      Shortcut for set',
  '',
  `Available levels: ${getAvailableLogLevels().join(', ')}`
].join('\n');

export async function runCli(argv = process.argv.slice(2), io: CliIo = DEFAULT_IO): Promise<number> {
  const command = argv[0] ?? 'help';

  switch (command) {
    case 'evaluate': {
      return runEvaluateCommand(argv.slice(1), io);
    }
    case 'validate': {
      return runValidateCommand(argv.slice(1), io);
    }
    case 'rules': {
      return runRulesCommand(argv.slice(1), io);
    }
    case 'log-level': {
      return runLogLevelCommand(argv.slice(1), io);
    }
    case 'help':
    case '--help':
    case '-h': {
      io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
      return 0;
    }
    default: {
      io.stderr.write(`Unknown command: ${command}\n`);
      io.stderr.write(`${USAGE_LINES.join('\n')}\n`);
      return 1;
    }
  }
}

function readOptionValue(args: string[], index: number, flag: string, errors: string[]): string | undefined {
  const value = args[index + 1];
  if (!value || value.startsWith('-')) {
    errors.push(`Missing value for ${flag}`);
    return undefined;
  }
  return value;
}

function parseEvaluateArgs(args: string[]): EvaluateCliArgs {
  const result: EvaluateCliArgs = { errors: [] };
  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (!token) {
      continue;
    }
    if (token === '--help' || token === '-h') {
      result.help = true;
      continue;
    }
    if (token === '--config' || token === '-c') {
      result.configPath = readOptionValue(args, index, '--config', result.errors);
      index += result.configPath ? 1 : 0;
      continue;
    }
    if (token === '--event' || token === '-e') {
      result.eventJson = readOptionValue(args, index, '--event', result.errors);
      index += result.eventJson ? 1 : 0;
      continue;
    }
    if (token.startsWith('-')) {
      result.errors.push(`Unknown option: ${token}`);
      continue;
    }
    if (result.eventPath) {
      result.errors.push(`Unexpected argument: ${token}`);
      continue;
    }
    result.eventPath = token;
  }

  if (!result.help && result.errors.length === 0) {
    if (result.eventPath && result.eventJson) {
      result.errors.push('Pass either an event file or --event, not both');
    } else if (!result.eventPath && !result.eventJson) {
      result.errors.push('Missing event: pass an event file or --event <json>');
    }
  }
  return result;
}

function parseConfigOnlyArgs(args: string[]): { configPath?: string; errors: string[] } {
  const result: { configPath?: string; errors: string[] } = { errors: [] };
  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (!token) {
      continue;
    }
    if (token === '--config' || token === '-c') {
      result.configPath = readOptionValue(args, index, '--config', result.errors);
      index += result.configPath ? 1 : 0;
      continue;
    }
    if (!token.startsWith('-') && !result.configPath) {
      result.configPath = token;
      continue;
    }
    result.errors.push(`Unknown option: ${token}`);
  }
  return result;
}

function writeError(error: unknown, io: CliIo) {
  if (error instanceof ConfigValidationError) {
    for (const issue of error.issues) {
      io.stderr.write(`${issue.path} ${issue.message}\n`);
    }
    return;
  }
  const message = error instanceof Error ? error.message : String(error);
  io.stderr.write(`${message}\n`);
}

function loadRules(configPath: string | undefined, io: CliIo): FingerprintingConfig | null {
  const resolved = configPath ? path.resolve(configPath) : getEngineSettings().rulesPath;
  try {
    return loadConfigFromFile(resolved);
  } catch (error) {
    io.stderr.write(`Invalid fingerprinting config: ${resolved}\n`);
    writeError(error, io);
    return null;
  }
}

function readEvent(parsed: EvaluateCliArgs): unknown {
  const contents = parsed.eventJson ?? fs.readFileSync(path.resolve(parsed.eventPath ?? ''), 'utf-8');
  try {
    return JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Event is not valid JSON: ${message}`);
  }
}

async function runEvaluateCommand(args: string[], io: CliIo): Promise<number> {
  const parsed = parseEvaluateArgs(args);
  if (parsed.help) {
    io.stdout.write(`${EVALUATE_USAGE}\n`);
    return 0;
  }
  if (parsed.errors.length > 0) {
    for (const message of parsed.errors) {
      io.stderr.write(`${message}\n`);
    }
    return 1;
  }

  const config = loadRules(parsed.configPath, io);
  if (!config) {
    return 1;
  }

  try {
    const event = normalizeEventAttributes(readEvent(parsed));
    const engine = new FingerprintEngine(new StaticConfigSource(config), {
      defaultFingerprint: getEngineSettings().defaultFingerprint
    });
    const result = engine.evaluate(event);
    io.stdout.write(`${JSON.stringify(serializeGroupingResult(result))}\n`);
    return 0;
  } catch (error) {
    writeError(error, io);
    return 1;
  }
}

async function runValidateCommand(args: string[], io: CliIo): Promise<number> {
  const parsed = parseConfigOnlyArgs(args);
  if (parsed.errors.length > 0) {
    for (const message of parsed.errors) {
      io.stderr.write(`${message}\n`);
    }
    return 1;
  }

  const config = loadRules(parsed.configPath, io);
  if (!config) {
    return 1;
  }
  io.stdout.write(`valid: ${config.rules.length} rules (version ${config.version})\n`);
  return 0;
}

async function runRulesCommand(args: string[], io: CliIo): Promise<number> {
  const parsed = parseConfigOnlyArgs(args);
  if (parsed.errors.length > 0) {
    for (const message of parsed.errors) {
      io.stderr.write(`${message}\n`);
    }
    return 1;
  }

  const config = loadRules(parsed.configPath, io);
  if (!config) {
    return 1;
  }
  for (const rule of config.rules) {
    io.stdout.write(`${rule.index}: ${rule.text}\n`);
  }
  return 0;
}

async function runLogLevelCommand(args: string[], io: CliIo): Promise<number> {
  const [first, second] = args;
  const available = getAvailableLogLevels();

  if (!first || first === 'get') {
    io.stdout.write(`${getLogLevel()}\n`);
    return 0;
  }

  if (first === 'help' || first === '--help' || first === '-h') {
    io.stdout.write(`${LOG_LEVEL_USAGE}\n`);
    return 0;
  }

  if (first === 'set') {
    if (!second) {
      io.stderr.write('Missing value for log level\n');
      io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
      return 1;
    }
    return applyLogLevel(second, io);
  }

  if (first.startsWith('-')) {
    io.stderr.write(`Unknown option: ${first}\n`);
    io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
    return 1;
  }

  if (!available.includes(first.toLowerCase())) {
    io.stderr.write(`Unknown log level "${first}" (available: ${available.join(', ')})\n`);
    return 1;
  }

  return applyLogLevel(first, io);
}

function applyLogLevel(level: string, io: CliIo): number {
  try {
    const normalized = setLogLevel(level);
    io.stdout.write(`Log level set to ${normalized}\n`);
    return 0;
  } catch (error) {
    writeError(error, io);
    return 1;
  }
}

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.error({ err: error }, 'Fingerprinting CLI failed');
      process.exit(1);
    }
  );
}
