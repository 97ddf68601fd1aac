import { Router } from 'express';
import { DEFAULT_MAX_RESULTS, findReference, searchText } from '../../src/corpus/search';
import type { SessionManager } from '../session-manager';
import { parseIndexParam, queryString, sendFailure } from './params';

export function createSearchRouter(sessions: SessionManager): Router {
  const router = Router();

  // GET /api/search?q=&limit=&caseSensitive= - Full-text search
  router.get('/', (req, res) => {
    try {
      const query = queryString(req.query.q)?.trim() ?? '';
      if (!query) {
        res.status(400).json({ error: 'Missing search query' });
        return;
      }

      const limit = req.query.limit === undefined ? DEFAULT_MAX_RESULTS : parseIndexParam(req.query.limit);
      if (limit === null || limit === 0) {
        res.status(400).json({ error: 'Invalid limit' });
        return;
      }

      const hits = searchText(sessions.getCorpus(), query, {
        maxResults: limit,
        caseSensitive: queryString(req.query.caseSensitive) === 'true',
      });
      res.json({ query, hits });
    } catch (err) {
      sendFailure(res, err, 'search');
    }
  });

  // GET /api/search/reference?q= - Resolve "João 3:16" style references
  router.get('/reference', (req, res) => {
    try {
      const query = queryString(req.query.q)?.trim() ?? '';
      const match = query ? findReference(sessions.getCorpus(), query) : null;
      if (!match) {
        res.status(404).json({ error: 'Reference not found' });
        return;
      }
      res.json(match);
    } catch (err) {
      sendFailure(res, err, 'resolve reference');
    }
  });

  return router;
}
