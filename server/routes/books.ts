import { Router, Request, Response } from 'express';
import type { HistoryStore } from '../history-store';
import type { SessionManager } from '../session-manager';
import { parseIndexParam, sendFailure } from './params';

interface BookParams {
  book: string;
}

interface ChapterParams extends BookParams {
  chapter: string;
}

export function createBooksRouter(sessions: SessionManager, history: HistoryStore): Router {
  const router = Router();

  // GET /api/books - Books of the active translation
  router.get('/', (_req, res) => {
    try {
      const corpus = sessions.getCorpus();
      res.json({
        translation: corpus.translation,
        books: corpus.listBooks().map(book => ({
          ...book,
          chaptersRead: history.chaptersReadForBook(book.abbrev).length,
        })),
      });
    } catch (err) {
      sendFailure(res, err, 'list books');
    }
  });

  // GET /api/books/:book/chapters - Chapter grid for one book
  router.get('/:book/chapters', (req: Request<BookParams>, res: Response) => {
    try {
      const corpus = sessions.getCorpus();
      const bookIndex = parseIndexParam(req.params.book);
      if (bookIndex === null || bookIndex >= corpus.bookCount()) {
        res.status(404).json({ error: 'Book not found' });
        return;
      }

      const bookId = corpus.bookId(bookIndex);
      const read = new Set(history.chaptersReadForBook(bookId));
      const chapters = Array.from({ length: corpus.bookLength(bookIndex) }, (_, chapterIndex) => ({
        chapterIndex,
        verses: corpus.chapterLength(bookIndex, chapterIndex),
        read: read.has(chapterIndex),
      }));

      res.json({ bookIndex, abbrev: bookId, name: corpus.bookName(bookIndex), chapters });
    } catch (err) {
      sendFailure(res, err, 'list chapters');
    }
  });

  // GET /api/books/:book/chapters/:chapter - Verse texts of one chapter
  router.get('/:book/chapters/:chapter', (req: Request<ChapterParams>, res: Response) => {
    try {
      const corpus = sessions.getCorpus();
      const bookIndex = parseIndexParam(req.params.book);
      const chapterIndex = parseIndexParam(req.params.chapter);
      if (
        bookIndex === null ||
        chapterIndex === null ||
        !corpus.isValid({ bookIndex, chapterIndex, verseIndex: 0 })
      ) {
        res.status(404).json({ error: 'Chapter not found' });
        return;
      }

      res.json({
        bookIndex,
        chapterIndex,
        reference: `${corpus.bookName(bookIndex)} ${chapterIndex + 1}`,
        verses: corpus.getChapter(bookIndex, chapterIndex),
      });
    } catch (err) {
      sendFailure(res, err, 'get chapter');
    }
  });

  return router;
}
