import { Router, Request, Response } from 'express';
import type { MusicPlayer } from '../music';
import type { SessionManager } from '../session-manager';
import { isRecord } from '../utils/json-file';
import { sendFailure } from './params';

export function createMusicRouter(music: MusicPlayer, sessions: SessionManager): Router {
  const router = Router();

  // GET /api/music - Transport state
  router.get('/', (_req, res) => {
    res.json(music.getState());
  });

  const commands: Record<string, () => void> = {
    toggle: () => music.toggle(),
    next: () => music.next(),
    previous: () => music.previous(),
    ended: () => music.trackEnded(),
    shuffle: () => {
      music.toggleShuffle();
    },
  };

  for (const [name, run] of Object.entries(commands)) {
    router.post(`/${name}`, (_req, res) => {
      try {
        run();
        res.json(music.getState());
      } catch (err) {
        sendFailure(res, err, `music ${name}`);
      }
    });
  }

  // PUT /api/music/volume - { volume: 0..1 }
  router.put('/volume', (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      const volume = isRecord(body) ? body.volume : undefined;
      if (typeof volume !== 'number' || !Number.isFinite(volume)) {
        res.status(400).json({ error: 'Invalid volume' });
        return;
      }
      sessions.setMusicVolume(volume);
      res.json(music.getState());
    } catch (err) {
      sendFailure(res, err, 'set volume');
    }
  });

  // PUT /api/music/folder - { folder: string | null }
  router.put('/folder', (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      const requested = isRecord(body) ? body.folder : undefined;
      if (typeof requested !== 'string' && requested !== null) {
        res.status(400).json({ error: 'Invalid folder' });
        return;
      }
      const folder = requested === null || requested.trim() === '' ? null : requested.trim();
      const found = sessions.setMusicFolder(folder);
      res.json({ ...music.getState(), found });
    } catch (err) {
      sendFailure(res, err, 'set music folder');
    }
  });

  // GET /api/music/track - Current audio file for the renderer
  router.get('/track', (_req, res) => {
    const track = music.currentTrackPath();
    if (!track) {
      res.status(404).json({ error: 'No track' });
      return;
    }
    // Allow paths through dot-directories such as ~/.local/share
    res.sendFile(track, { dotfiles: 'allow' }, err => {
      if (!err || res.headersSent) return;
      if ('status' in err && err.status === 404) {
        console.warn(`Track no longer on disk: ${track}`);
        res.status(404).json({ error: 'Track not found' });
        return;
      }
      console.error('Failed to send track:', err);
      res.status(500).json({ error: 'Failed to send track' });
    });
  });

  return router;
}
