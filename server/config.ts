import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

export interface ServerConfig {
  port: number;
  host: string;
}

export interface StorageConfig {
  dataDir: string;
  corpusDir: string;
  settingsPath: string;
  historyPath: string;
  dbPath: string;
}

export interface AppConfig {
  server: ServerConfig;
  storage: StorageConfig;
}

interface RawConfig {
  server?: {
    port?: number;
    host?: string;
  };
  storage?: {
    dataDir?: string;
    corpusDir?: string;
  };
}

interface CliArgs {
  config?: string;
  port?: number;
  host?: string;
  dataDir?: string;
  corpusDir?: string;
}

const DEFAULT_PORT = 7788;
const DEFAULT_HOST = '127.0.0.1';
const DEFAULT_DATA_DIR = '~/.local/share/versepace';

export function expandPath(p: string): string {
  if (p.startsWith('~/')) {
    return path.join(os.homedir(), p.slice(2));
  }
  return p;
}

function findConfigFile(cliConfigPath?: string): string | null {
  // CLI override takes priority
  if (cliConfigPath) {
    const expanded = expandPath(cliConfigPath);
    if (fs.existsSync(expanded)) {
      return expanded;
    }
    console.warn(`Config file not found: ${expanded}`);
    return null;
  }

  const defaultPaths = [
    path.join(os.homedir(), '.config', 'versepace', 'config.json'),
    path.join(process.cwd(), 'config.json'),
  ];

  for (const p of defaultPaths) {
    if (fs.existsSync(p)) {
      return p;
    }
  }

  return null;
}

function parsePort(value: string): number | undefined {
  const port = parseInt(value, 10);
  return Number.isInteger(port) && port >= 0 && port < 65536 ? port : undefined;
}

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);

    const takeValue = (): string | undefined => inline ?? args[++i];

    switch (flag) {
      case '--config':
        result.config = takeValue();
        break;
      case '--port': {
        const value = takeValue();
        if (value !== undefined) result.port = parsePort(value);
        break;
      }
      case '--host':
        result.host = takeValue();
        break;
      case '--data-dir':
        result.dataDir = takeValue();
        break;
      case '--corpus-dir':
        result.corpusDir = takeValue();
        break;
    }
  }

  return result;
}

function readRawConfig(configPath: string): RawConfig {
  const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error('top level must be an object');
  }

  const raw: RawConfig = {};
  if ('server' in parsed && parsed.server && typeof parsed.server === 'object') {
    const server = parsed.server;
    raw.server = {
      port: 'port' in server && typeof server.port === 'number' ? server.port : undefined,
      host: 'host' in server && typeof server.host === 'string' ? server.host : undefined,
    };
  }
  if ('storage' in parsed && parsed.storage && typeof parsed.storage === 'object') {
    const storage = parsed.storage;
    raw.storage = {
      dataDir: 'dataDir' in storage && typeof storage.dataDir === 'string' ? storage.dataDir : undefined,
      corpusDir: 'corpusDir' in storage && typeof storage.corpusDir === 'string' ? storage.corpusDir : undefined,
    };
  }
  return raw;
}

export function loadConfig(argv: string[] = process.argv.slice(2)): AppConfig {
  const cliArgs = parseCliArgs(argv);
  const configPath = findConfigFile(cliArgs.config);

  let rawConfig: RawConfig = {};

  if (configPath) {
    try {
      rawConfig = readRawConfig(configPath);
      console.log(`Loaded config from: ${configPath}`);
    } catch (err) {
      console.error(`Failed to parse config file: ${err}`);
    }
  } else {
    console.log('Using default configuration');
  }

  // CLI args override config file
  const port = cliArgs.port ?? rawConfig.server?.port ?? DEFAULT_PORT;
  const host = cliArgs.host ?? rawConfig.server?.host ?? DEFAULT_HOST;
  const dataDir = expandPath(cliArgs.dataDir ?? rawConfig.storage?.dataDir ?? DEFAULT_DATA_DIR);
  const corpusDir = expandPath(cliArgs.corpusDir ?? rawConfig.storage?.corpusDir ?? path.join(dataDir, 'corpus'));

  return {
    server: { port, host },
    storage: {
      dataDir,
      corpusDir,
      settingsPath: path.join(dataDir, 'settings.json'),
      historyPath: path.join(dataDir, 'history.json'),
      dbPath: path.join(dataDir, 'versepace.db'),
    },
  };
}

export function ensureStorageDirs(config: AppConfig): void {
  const dirs = [config.storage.dataDir, config.storage.corpusDir];

  for (const dir of dirs) {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
      console.log(`Created directory: ${dir}`);
    }
  }
}
