import express from 'express';
import type { Express } from 'express';
import type { DB } from './db';
import type { HistoryStore } from './history-store';
import type { MusicPlayer } from './music';
import type { SessionManager } from './session-manager';
import type { SettingsStore } from './settings-store';
import { createBooksRouter } from './routes/books';
import { createFavoritesRouter } from './routes/favorites';
import { createMusicRouter } from './routes/music';
import { createSearchRouter } from './routes/search';
import { createSessionRouter } from './routes/session';
import { createSettingsRouter } from './routes/settings';
import { createStatsRouter } from './routes/stats';

export interface AppDeps {
  sessions: SessionManager;
  settings: SettingsStore;
  history: HistoryStore;
  music: MusicPlayer;
  db: DB;
}

export function createApp({ sessions, settings, history, music, db }: AppDeps): Express {
  const app = express();

  // Middleware
  app.use(express.json());

  // API routes
  app.use('/api/session', createSessionRouter(sessions));
  app.use('/api/books', createBooksRouter(sessions, history));
  app.use('/api/search', createSearchRouter(sessions));
  app.use('/api/stats', createStatsRouter(sessions, history));
  app.use('/api/favorites', createFavoritesRouter(db, sessions));
  app.use('/api/music', createMusicRouter(music, sessions));
  app.use('/api/settings', createSettingsRouter(settings, sessions));

  return app;
}
