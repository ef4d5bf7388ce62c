import { describe, expect, it } from 'vitest';
import { createApiHandler } from './apiRouter';
import { DocumentProcessor } from './documentProcessor';
import type { ModelAction } from './geminiService';
import { RagSystem } from './ragService';
import { SessionManager } from './sessionManager';
import { MCP_COURSE, QUEUES_COURSE, ScriptedModel, seedCourses, TEST_VOCABULARY, VocabularyEmbedder } from './testUtils';
import { VectorStore } from './vectorStore';

async function createHandler(script: Array<ModelAction | Error> = []) {
  const store = new VectorStore({ embedder: new VocabularyEmbedder(TEST_VOCABULARY) });
  await seedCourses(store);
  const sessions = new SessionManager();
  const rag = new RagSystem({ store, model: new ScriptedModel(script), sessions, documents: new DocumentProcessor() });
  return { handler: createApiHandler(rag), sessions };
}

const postQuery = (body: string) =>
  new Request('http://localhost/api/query', {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body,
  });

describe('API routes', () => {
  it('reports status at the root', async () => {
    const { handler } = await createHandler();

    const response = await handler(new Request('http://localhost/'));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ message: 'Course Materials RAG System', status: 'running' });
  });

  it('answers a query and creates a session', async () => {
    const { handler, sessions } = await createHandler([{ kind: 'answer', text: '4' }]);

    const response = await handler(postQuery(JSON.stringify({ query: 'What is 2+2?' })));
    const body: { answer: string; sources: unknown[]; session_id: string } = await response.json();

    expect(response.status).toBe(200);
    expect(body.answer).toBe('4');
    expect(body.sources).toEqual([]);
    expect(sessions.getConversationHistory(body.session_id)).toBe('User: What is 2+2?\nAssistant: 4');
  });

  it('returns sources and keeps the given session id', async () => {
    const { handler } = await createHandler([
      { kind: 'tool_use', calls: [{ name: 'search_course_content', args: { query: 'server', course_name: 'MCP', lesson_number: 1 } }] },
      { kind: 'answer', text: 'Servers expose tools.' },
    ]);

    const response = await handler(postQuery(JSON.stringify({ query: 'What is MCP?', session_id: 'session-1' })));

    expect(await response.json()).toEqual({
      answer: 'Servers expose tools.',
      sources: [{ label: 'Introduction to MCP - Lesson 1', link: 'https://example.com/mcp/1' }],
      session_id: 'session-1',
    });
  });

  it('treats a null session id as absent', async () => {
    const { handler } = await createHandler([{ kind: 'answer', text: 'ok' }]);

    const response = await handler(postQuery(JSON.stringify({ query: 'hi', session_id: null })));
    const body: { session_id: string } = await response.json();

    expect(response.status).toBe(200);
    expect(body.session_id).not.toBe('');
  });

  it('rejects a body that is not JSON', async () => {
    const { handler } = await createHandler();

    const response = await handler(postQuery('{not json'));

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({ detail: 'Request body must be valid JSON' });
  });

  it('rejects a body without a query', async () => {
    const { handler } = await createHandler();

    const response = await handler(postQuery(JSON.stringify({ session_id: 'x' })));

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({ detail: 'query: Required' });
  });

  it('reports query failures as 500 with the error message', async () => {
    const { handler } = await createHandler([new Error('model down')]);

    const response = await handler(postQuery(JSON.stringify({ query: 'What is MCP?' })));

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ detail: 'model down' });
  });

  it('lists indexed courses', async () => {
    const { handler } = await createHandler();

    const response = await handler(new Request('http://localhost/api/courses'));

    expect(await response.json()).toEqual({
      total_courses: 2,
      course_titles: [MCP_COURSE.title, QUEUES_COURSE.title],
    });
  });

  it('deletes a session', async () => {
    const { handler, sessions } = await createHandler();
    const id = sessions.createSession();

    const first = await handler(new Request(`http://localhost/api/session/${id}`, { method: 'DELETE' }));
    const second = await handler(new Request(`http://localhost/api/session/${id}`, { method: 'DELETE' }));

    expect(await first.json()).toEqual({ status: 'success', message: `Session ${id} deleted` });
    expect(second.status).toBe(200);
    expect(await second.json()).toEqual({ status: 'not_found', message: `Session ${id} not found` });
    expect(sessions.hasSession(id)).toBe(false);
  });

  it('answers unknown routes with 404', async () => {
    const { handler } = await createHandler();

    const response = await handler(new Request('http://localhost/api/nothing-here'));

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ detail: 'Not Found' });
  });
});

describe('Cross-origin access', () => {
  const origin = 'http://localhost:5173';

  it('allows any origin on reads', async () => {
    const { handler } = await createHandler();

    const response = await handler(new Request('http://localhost/api/courses', { headers: { origin } }));

    expect(response.status).toBe(200);
    expect(response.headers.get('access-control-allow-origin')).toBe('*');
  });

  it('allows any origin on queries', async () => {
    const { handler } = await createHandler([{ kind: 'answer', text: '4' }]);

    const response = await handler(new Request('http://localhost/api/query', {
      method: 'POST',
      headers: { 'content-type': 'application/json', origin },
      body: JSON.stringify({ query: 'What is 2+2?' }),
    }));

    expect(response.status).toBe(200);
    expect(response.headers.get('access-control-allow-origin')).toBe('*');
  });

  it('answers a preflight request without routing it', async () => {
    const { handler } = await createHandler();

    const response = await handler(new Request('http://localhost/api/query', {
      method: 'OPTIONS',
      headers: { origin, 'access-control-request-method': 'POST' },
    }));

    expect(response.status).toBe(204);
    expect(response.headers.get('access-control-allow-origin')).toBe('*');
  });

  it('adds the header to error responses', async () => {
    const { handler } = await createHandler();

    const response = await handler(new Request('http://localhost/api/nothing-here', { headers: { origin } }));

    expect(response.status).toBe(404);
    expect(response.headers.get('access-control-allow-origin')).toBe('*');
  });
});
