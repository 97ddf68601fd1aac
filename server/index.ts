import { loadCorpus } from '../src/corpus/corpus';
import { CorpusLoadError } from '../src/errors';
import { createApp } from './app';
import { loadConfig, ensureStorageDirs } from './config';
import { DB } from './db';
import { HistoryStore } from './history-store';
import { MusicPlayer } from './music';
import { SessionManager } from './session-manager';
import { SettingsStore } from './settings-store';

async function main() {
  const config = loadConfig();
  ensureStorageDirs(config);

  const settings = SettingsStore.load(config.storage.settingsPath);
  const history = HistoryStore.load(config.storage.historyPath);
  const music = new MusicPlayer();
  const sessions = new SessionManager({
    settings,
    history,
    music,
    loadCorpus: translation => loadCorpus(config.storage.corpusDir, translation),
  });

  // Fail fast when the configured translation cannot be read
  try {
    sessions.getCorpus();
  } catch (err) {
    if (!(err instanceof CorpusLoadError)) throw err;
    console.error(`\nError: ${err.message}`, err.cause ?? '');
    console.error(`Place the translation files in ${config.storage.corpusDir}`);
    process.exit(1);
  }

  if (sessions.isFirstRun()) {
    console.log(`No translation chosen yet, using ${sessions.getTranslation()}`);
  }

  const db = await DB.create(config);
  const app = createApp({ sessions, settings, history, music, db });

  const shutdown = () => {
    sessions.close();
    db.close();
  };

  // Start server
  const server = app.listen(config.server.port, config.server.host, () => {
    console.log(`\nversepace server running at:`);
    console.log(`  http://${config.server.host}:${config.server.port}`);
    console.log(`\nData directory: ${config.storage.dataDir}\n`);
  });

  server.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      console.error(`\nError: Port ${config.server.port} is already in use.`);
      console.error(`Another process is listening on ${config.server.host}:${config.server.port}`);
    } else if (err.code === 'EACCES') {
      console.error(`\nError: Permission denied for port ${config.server.port}.`);
    } else {
      console.error(`\nError starting server:`, err);
    }
    shutdown();
    process.exit(1);
  });

  // Graceful shutdown
  process.on('SIGINT', () => {
    console.log('\nShutting down...');
    shutdown();
    process.exit(0);
  });

  process.on('SIGTERM', () => {
    shutdown();
    process.exit(0);
  });
}

main().catch((err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
