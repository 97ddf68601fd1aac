import { Router } from 'express';
import type { HistoryStore } from '../history-store';
import type { SessionManager } from '../session-manager';
import { sendFailure } from './params';

export function createStatsRouter(sessions: SessionManager, history: HistoryStore): Router {
  const router = Router();

  // GET /api/stats - Reading dashboard
  router.get('/', (_req, res) => {
    try {
      const corpus = sessions.getCorpus();
      const books = corpus.listBooks().map(book => ({
        abbrev: book.abbrev,
        name: book.name,
        chapters: book.chapters,
        chaptersRead: history.chaptersReadForBook(book.abbrev),
      }));

      res.json({ ...sessions.getStats(), books });
    } catch (err) {
      sendFailure(res, err, 'get stats');
    }
  });

  // DELETE /api/stats - Reset reading history
  router.delete('/', (_req, res) => {
    try {
      history.clear();
      res.json({ success: true });
    } catch (err) {
      sendFailure(res, err, 'reset stats');
    }
  });

  return router;
}
