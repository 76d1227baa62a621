import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from './app';
import { openDatabase, type Db } from './db';
import { ProjectStore } from './store';
import type { Comment, Project, ProjectDetail, ProjectSummary, Task, TaskDetail } from './types';

describe('HTTP API', () => {
  let db: Db;
  let server: Server;
  let base: string;

  async function call<T>(method: string, path: string, body?: unknown): Promise<{ status: number; json: T }> {
    const res = await fetch(`${base}${path}`, {
      method,
      headers: { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body)
    });
    const text = await res.text();
    return { status: res.status, json: text ? JSON.parse(text) : undefined };
  }

  beforeEach(async () => {
    db = openDatabase(':memory:');
    const app = createApp(new ProjectStore(db), { origins: ['http://localhost:5173'] });
    server = await new Promise<Server>(resolve => {
      const s = app.listen(0, '127.0.0.1', () => resolve(s));
    });
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server is not listening on a TCP port');
    base = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
    db.close();
  });

  it('answers the health check', async () => {
    const res = await call<{ ok: boolean }>('GET', '/health');
    expect(res).toEqual({ status: 200, json: { ok: true } });
  });

  it('creates, lists, shows and deletes a project', async () => {
    const created = await call<Project>('POST', '/projects', { name: 'Launch', description: 'v1' });
    expect(created.status).toBe(201);
    expect(created.json).toMatchObject({ name: 'Launch', description: 'v1', status: 'active' });

    const list = await call<ProjectSummary[]>('GET', '/projects');
    expect(list.json).toEqual([{ ...created.json, taskCount: 0 }]);

    const detail = await call<ProjectDetail>('GET', `/projects/${created.json.id}`);
    expect(detail.json).toEqual({ ...created.json, tasks: [], comments: [] });

    const removed = await call('DELETE', `/projects/${created.json.id}`);
    expect(removed.status).toBe(204);

    const gone = await call<{ code: string }>('GET', `/projects/${created.json.id}`);
    expect(gone.status).toBe(404);
    expect(gone.json.code).toBe('NOT_FOUND');
  });

  it('returns 400 for a missing or empty name', async () => {
    const missing = await call<{ code: string; details: { errors: { field: string }[] } }>('POST', '/projects', {});
    expect(missing.status).toBe(400);
    expect(missing.json.code).toBe('VALIDATION_ERROR');
    expect(missing.json.details.errors.map(e => e.field)).toEqual(['name']);

    const empty = await call<{ error: string }>('POST', '/projects', { name: '' });
    expect(empty).toEqual({
      status: 400,
      json: { error: 'Project name is required', code: 'VALIDATION_ERROR', details: { field: 'Project name' } }
    });
  });

  it('returns 400 for a body that is not JSON', async () => {
    const res = await fetch(`${base}/projects`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"name":'
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid JSON in request body', code: 'INVALID_JSON' });
  });

  it('returns 413 for a body over the size limit', async () => {
    const res = await call<{ error: string; code: string }>('POST', '/projects', {
      name: 'Huge',
      iconData: 'A'.repeat(6 * 1024 * 1024)
    });
    expect(res).toEqual({ status: 413, json: { error: 'request entity too large', code: 'PAYLOAD_TOO_LARGE' } });
  });

  it('returns 415 for an unsupported charset', async () => {
    const res = await fetch(`${base}/projects`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json; charset=foo' },
      body: JSON.stringify({ name: 'P' })
    });
    expect(res.status).toBe(415);
    expect(await res.json()).toEqual({ error: 'unsupported charset "FOO"', code: 'UNSUPPORTED_MEDIA_TYPE' });
  });

  it('renames a project', async () => {
    const { json: p } = await call<Project>('POST', '/projects', { name: 'Old' });
    const res = await call<Project>('PUT', `/projects/${p.id}`, { name: 'New' });
    expect(res.status).toBe(200);
    expect(res.json).toEqual({ ...p, name: 'New' });
  });

  it('walks a task through its lifecycle', async () => {
    const { json: p } = await call<Project>('POST', '/projects', { name: 'Launch' });
    const { status, json: design } = await call<Task>('POST', `/projects/${p.id}/tasks`, { title: 'Design' });
    expect(status).toBe(201);
    expect(design.status).toBe('pending');

    const { json: sub } = await call<Task>('POST', `/projects/${p.id}/tasks`, {
      title: 'Wireframes',
      parentTaskId: design.id
    });
    const comment = await call<Comment>('POST', `/tasks/${sub.id}/comments`, { text: 'looks good' });
    expect(comment.status).toBe(201);
    expect(comment.json.parent).toEqual({ kind: 'task', id: sub.id });

    const updated = await call<Task>('PUT', `/tasks/${design.id}/status`, { status: 'in_progress' });
    expect(updated.json).toEqual({ ...design, status: 'in_progress' });

    const detail = await call<TaskDetail>('GET', `/tasks/${design.id}`);
    expect(detail.json.subtasks.map(s => [s.id, s.commentCount])).toEqual([[sub.id, 1]]);

    const project = await call<ProjectDetail>('GET', `/projects/${p.id}`);
    expect(project.json.tasks.map(t => [t.title, t.status, t.subtaskCount])).toEqual([['Design', 'in_progress', 1]]);

    const count = await call<{ count: number }>('GET', `/projects/${p.id}/task-count`);
    expect(count.json).toEqual({ count: 2 });

    expect((await call('DELETE', `/tasks/${design.id}`)).status).toBe(204);
    expect((await call('GET', `/tasks/${sub.id}`)).status).toBe(404);
  });

  it('maps task failures to 400 and 404', async () => {
    const { json: p } = await call<Project>('POST', '/projects', { name: 'P' });
    const { json: t } = await call<Task>('POST', `/projects/${p.id}/tasks`, { title: 'T' });

    expect((await call('POST', `/projects/${p.id}/tasks`, { title: ' ' })).status).toBe(400);
    expect((await call('POST', '/projects/nope/tasks', { title: 'T' })).status).toBe(404);
    expect((await call('POST', `/projects/${p.id}/tasks`, { title: 'T', parentTaskId: 'nope' })).status).toBe(404);
    expect((await call('PUT', `/tasks/${t.id}/status`, { status: 'done' })).status).toBe(400);
    expect((await call('PUT', '/tasks/nope/status', { status: 'pending' })).status).toBe(404);
    expect((await call('DELETE', '/tasks/nope')).status).toBe(404);

    const after = await call<TaskDetail>('GET', `/tasks/${t.id}`);
    expect(after.json.task.status).toBe('pending');
  });

  it('adds and removes project comments', async () => {
    const { json: p } = await call<Project>('POST', '/projects', { name: 'P' });

    expect((await call('POST', `/projects/${p.id}/comments`, { text: '' })).status).toBe(400);
    expect((await call('POST', '/projects/nope/comments', { text: 'hi' })).status).toBe(404);

    const { json: c } = await call<Comment>('POST', `/projects/${p.id}/comments`, { text: 'hi', author: 'Ana' });
    expect(c).toMatchObject({ text: 'hi', author: 'Ana', parent: { kind: 'project', id: p.id } });

    expect((await call('DELETE', `/comments/${c.id}`)).status).toBe(204);
    expect((await call('DELETE', `/comments/${c.id}`)).status).toBe(404);
  });

  it('answers unknown routes with 404', async () => {
    const res = await call<{ code: string }>('GET', '/nowhere');
    expect(res).toEqual({ status: 404, json: { error: 'Route not found', code: 'NOT_FOUND' } });
  });
});
