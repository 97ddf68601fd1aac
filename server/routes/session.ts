import { Router, Request, Response } from 'express';
import type { Position } from '../../src/types';
import type { ReadingEngine } from '../../src/reading/engine';
import type { AppEvent, SessionManager } from '../session-manager';
import { parseConfigPatch, parsePosition, sendFailure } from './params';

const CONFIG_ACTIONS = new Map<string, (engine: ReadingEngine) => void>([
  ['toggle-mode', engine => engine.toggleMode()],
  ['faster', engine => engine.increaseSpeed()],
  ['slower', engine => engine.decreaseSpeed()],
  ['font-larger', engine => engine.increaseFont()],
  ['font-smaller', engine => engine.decreaseFont()],
  ['night-mode', engine => engine.toggleNightMode()],
  ['fullscreen', engine => engine.toggleFullscreen()],
]);

function requireEngine(sessions: SessionManager, res: Response): ReadingEngine | null {
  const engine = sessions.current();
  if (!engine) {
    res.status(409).json({ error: 'No reading session' });
    return null;
  }
  return engine;
}

export function createSessionRouter(sessions: SessionManager): Router {
  const router = Router();

  // GET /api/session - Current snapshot, null when not reading
  router.get('/', (_req, res) => {
    res.json(sessions.current()?.getSnapshot() ?? null);
  });

  // POST /api/session/enter - Open the reading screen
  router.post('/enter', (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      const requested = body && typeof body === 'object' && 'position' in body ? body.position : undefined;
      let position: Position | undefined;
      if (requested !== undefined) {
        const parsed = parsePosition(requested);
        if (!parsed) {
          res.status(400).json({ error: 'Invalid position' });
          return;
        }
        position = parsed;
      }

      const engine = sessions.enter(position);
      res.json(engine.getSnapshot());
    } catch (err) {
      sendFailure(res, err, 'enter session');
    }
  });

  // POST /api/session/exit - Back to the menu
  router.post('/exit', (_req, res) => {
    try {
      sessions.exit();
      res.json({ success: true });
    } catch (err) {
      sendFailure(res, err, 'exit session');
    }
  });

  const commands: Record<string, (engine: ReadingEngine) => void> = {
    toggle: engine => engine.togglePlayPause(),
    next: engine => engine.manualNext(),
    previous: engine => engine.manualPrevious(),
  };

  for (const [name, run] of Object.entries(commands)) {
    router.post(`/${name}`, (_req, res) => {
      try {
        const engine = requireEngine(sessions, res);
        if (!engine) return;
        run(engine);
        res.json(engine.getSnapshot());
      } catch (err) {
        sendFailure(res, err, name);
      }
    });
  }

  // PUT /api/session/position - Jump to a verse
  router.put('/position', (req: Request, res: Response) => {
    try {
      const engine = requireEngine(sessions, res);
      if (!engine) return;

      const position = parsePosition(req.body);
      if (!position) {
        res.status(400).json({ error: 'Invalid position' });
        return;
      }

      engine.selectPosition(position);
      res.json(engine.getSnapshot());
    } catch (err) {
      sendFailure(res, err, 'select position');
    }
  });

  // PATCH /api/session/config - Partial reading config
  router.patch('/config', (req: Request, res: Response) => {
    try {
      const engine = requireEngine(sessions, res);
      if (!engine) return;

      const patch = parseConfigPatch(req.body);
      if (!patch) {
        res.status(400).json({ error: 'Invalid reading config' });
        return;
      }

      engine.setConfig(patch);
      res.json(engine.getConfig());
    } catch (err) {
      sendFailure(res, err, 'update reading config');
    }
  });

  // POST /api/session/config/:action - One keyboard step (faster, font-larger, ...)
  router.post('/config/:action', (req: Request<{ action: string }>, res: Response) => {
    try {
      const action = CONFIG_ACTIONS.get(req.params.action);
      if (!action) {
        res.status(404).json({ error: 'Unknown config action' });
        return;
      }

      const engine = requireEngine(sessions, res);
      if (!engine) return;

      action(engine);
      res.json(engine.getConfig());
    } catch (err) {
      sendFailure(res, err, 'update reading config');
    }
  });

  // GET /api/session/events - Server-sent event stream
  router.get('/events', (req: Request, res: Response) => {
    res.set({
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });
    res.flushHeaders();

    const send = (event: AppEvent | { type: 'snapshot'; snapshot: unknown }) => {
      res.write(`event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`);
    };

    send({ type: 'snapshot', snapshot: sessions.current()?.getSnapshot() ?? null });
    const unsubscribe = sessions.subscribe(send);
    req.on('close', unsubscribe);
  });

  return router;
}
