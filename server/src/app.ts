import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import compression from 'compression';
import type { AppConfig } from './config';
import { isAppError } from './errors';
import type { ProjectStore } from './store';
import {
  addCommentSchema,
  createProjectSchema,
  createTaskSchema,
  parseBody,
  updateProjectSchema,
  updateTaskStatusSchema
} from './validation';

function isJsonParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

const CLIENT_ERROR_CODES: Record<number, string> = {
  413: 'PAYLOAD_TOO_LARGE',
  415: 'UNSUPPORTED_MEDIA_TYPE'
};

// 4xx errors raised by the body parser (http-errors with `expose` set).
function asClientError(err: unknown): { status: number; message: string } | undefined {
  if (!(err instanceof Error)) return undefined;
  const status = 'status' in err ? err.status : undefined;
  const expose = 'expose' in err ? err.expose : undefined;
  if (typeof status !== 'number' || status < 400 || status >= 500 || expose !== true) return undefined;
  return { status, message: err.message };
}

export function createApp(store: ProjectStore, config: Pick<AppConfig, 'origins'>) {
  const app = express();

  app.use(cors({ origin: config.origins }));
  app.use(compression());
  app.use(express.json({ limit: '5mb' }));

  app.get('/health', (_req, res) => {
    try {
      store.ping();
      res.json({ ok: true });
    } catch (e: unknown) {
      res.status(500).json({ ok: false, error: e instanceof Error ? e.message : String(e) });
    }
  });

  app.get('/projects', (_req, res) => {
    res.json(store.listProjects());
  });

  app.post('/projects', (req, res) => {
    const body = parseBody(createProjectSchema, req.body);
    res.status(201).json(store.createProject(body));
  });

  app.get('/projects/:id', (req, res) => {
    res.json(store.getProject(req.params.id));
  });

  app.put('/projects/:id', (req, res) => {
    const body = parseBody(updateProjectSchema, req.body);
    res.json(store.updateProject(req.params.id, body));
  });

  app.delete('/projects/:id', (req, res) => {
    store.deleteProject(req.params.id);
    res.status(204).end();
  });

  app.get('/projects/:id/task-count', (req, res) => {
    res.json({ count: store.countTasks(req.params.id) });
  });

  app.post('/projects/:id/tasks', (req, res) => {
    const { title, parentTaskId, description } = parseBody(createTaskSchema, req.body);
    const task = store.createTask({ projectId: req.params.id, parentTaskId, title, description });
    res.status(201).json(task);
  });

  app.post('/projects/:id/comments', (req, res) => {
    const { text, author } = parseBody(addCommentSchema, req.body);
    res.status(201).json(store.addComment({ parentKind: 'project', parentId: req.params.id, text, author }));
  });

  app.get('/tasks/:id', (req, res) => {
    res.json(store.getTaskDetail(req.params.id));
  });

  app.put('/tasks/:id/status', (req, res) => {
    const { status } = parseBody(updateTaskStatusSchema, req.body);
    store.updateTaskStatus(req.params.id, status);
    res.json(store.getTask(req.params.id));
  });

  app.delete('/tasks/:id', (req, res) => {
    store.deleteTask(req.params.id);
    res.status(204).end();
  });

  app.post('/tasks/:id/comments', (req, res) => {
    const { text, author } = parseBody(addCommentSchema, req.body);
    res.status(201).json(store.addComment({ parentKind: 'task', parentId: req.params.id, text, author }));
  });

  app.delete('/comments/:id', (req, res) => {
    store.deleteComment(req.params.id);
    res.status(204).end();
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Route not found', code: 'NOT_FOUND' });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isAppError(err)) {
      res.status(err.status).json({ error: err.message, code: err.code, details: err.details });
      return;
    }
    if (isJsonParseError(err)) {
      res.status(400).json({ error: 'Invalid JSON in request body', code: 'INVALID_JSON' });
      return;
    }
    const clientError = asClientError(err);
    if (clientError) {
      res
        .status(clientError.status)
        .json({ error: clientError.message, code: CLIENT_ERROR_CODES[clientError.status] ?? 'BAD_REQUEST' });
      return;
    }
    console.error('Unhandled error:', err);
    res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
  });

  return app;
}
