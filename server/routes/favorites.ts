import { Router, Request, Response } from 'express';
import type { DB, FavoriteRecord } from '../db';
import type { SessionManager } from '../session-manager';
import { isRecord } from '../utils/json-file';
import { parsePosition, sendFailure } from './params';

function toResponse(favorite: FavoriteRecord) {
  return {
    id: favorite.id,
    position: {
      bookIndex: favorite.book_index,
      chapterIndex: favorite.chapter_index,
      verseIndex: favorite.verse_index,
    },
    text: favorite.verse_text,
    reference: favorite.reference,
    note: favorite.note,
    createdAt: favorite.created_at,
  };
}

export function createFavoritesRouter(db: DB, sessions: SessionManager): Router {
  const router = Router();

  // GET /api/favorites - Newest first
  router.get('/', (_req, res) => {
    try {
      res.json(db.getFavorites().map(toResponse));
    } catch (err) {
      sendFailure(res, err, 'list favorites');
    }
  });

  // POST /api/favorites - Add a verse ({ position, note? })
  router.post('/', (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      const position = isRecord(body) ? parsePosition(body.position) : null;
      const note = isRecord(body) && typeof body.note === 'string' ? body.note : undefined;
      const corpus = sessions.getCorpus();
      if (!position || !corpus.isValid(position)) {
        res.status(400).json({ error: 'Invalid position' });
        return;
      }

      const { bookIndex, chapterIndex, verseIndex } = position;
      const added = db.addFavorite(
        position,
        corpus.getVerse(bookIndex, chapterIndex, verseIndex),
        corpus.reference(position),
        note
      );
      const favorite = db.getFavorite(position);
      if (!favorite) {
        throw new Error('Favorite missing after insert');
      }

      res.status(added ? 201 : 200).json({ ...toResponse(favorite), alreadyExists: !added });
    } catch (err) {
      sendFailure(res, err, 'add favorite');
    }
  });

  // DELETE /api/favorites - Remove a verse ({ position })
  router.delete('/', (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      const position = isRecord(body) ? parsePosition(body.position) : null;
      if (!position) {
        res.status(400).json({ error: 'Invalid position' });
        return;
      }

      if (!db.removeFavorite(position)) {
        res.status(404).json({ error: 'Favorite not found' });
        return;
      }
      res.json({ success: true });
    } catch (err) {
      sendFailure(res, err, 'remove favorite');
    }
  });

  // PUT /api/favorites/note - Replace the note on a favorite
  router.put('/note', (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      const position = isRecord(body) ? parsePosition(body.position) : null;
      const note = isRecord(body) ? body.note : undefined;
      if (!position || typeof note !== 'string') {
        res.status(400).json({ error: 'Invalid favorite note' });
        return;
      }

      if (!db.updateFavoriteNote(position, note)) {
        res.status(404).json({ error: 'Favorite not found' });
        return;
      }
      res.json({ success: true });
    } catch (err) {
      sendFailure(res, err, 'update favorite note');
    }
  });

  return router;
}
