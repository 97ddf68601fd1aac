import { Router, Request, Response } from 'express';
import type { SessionManager } from '../session-manager';
import { isTranslation } from '../settings-store';
import type { SettingsStore } from '../settings-store';
import { isRecord } from '../utils/json-file';
import { sendFailure } from './params';

export function createSettingsRouter(settings: SettingsStore, sessions: SessionManager): Router {
  const router = Router();

  // GET /api/settings - Persisted settings plus the effective translation
  router.get('/', (_req, res) => {
    res.json({
      ...settings.get(),
      activeTranslation: sessions.getTranslation(),
      firstRun: sessions.isFirstRun(),
    });
  });

  // PATCH /api/settings - { translation?, musicEnabled? }
  router.patch('/', (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      if (!isRecord(body)) {
        res.status(400).json({ error: 'Invalid settings' });
        return;
      }
      const { translation, musicEnabled } = body;
      if (translation !== undefined && !isTranslation(translation)) {
        res.status(400).json({ error: 'Unknown translation' });
        return;
      }
      if (musicEnabled !== undefined && typeof musicEnabled !== 'boolean') {
        res.status(400).json({ error: 'Invalid musicEnabled' });
        return;
      }

      if (translation !== undefined) {
        sessions.setTranslation(translation);
      }
      if (musicEnabled !== undefined) {
        sessions.setMusicEnabled(musicEnabled);
      }

      res.json({
        ...settings.get(),
        activeTranslation: sessions.getTranslation(),
        firstRun: sessions.isFirstRun(),
      });
    } catch (err) {
      sendFailure(res, err, 'update settings');
    }
  });

  return router;
}
