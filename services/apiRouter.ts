import { cors, type IRequest, json, Router } from 'itty-router';
import { z } from 'zod';
import type { RagSystem } from './ragService';

const queryBodySchema = z.object({
  query: z.string(),
  session_id: z.string().min(1).nullish(),
});

const detail = (status: number, message: string) => json({ detail: message }, { status });

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * HTTP routes around the RAG system. Returns a fetch-style handler so it
 * runs the same under the Node adapter and in tests. Any origin may call
 * it; preflight requests are answered before routing.
 */
export function createApiHandler(rag: RagSystem): (request: Request) => Promise<Response> {
  const { preflight, corsify } = cors();
  const router = Router({ before: [preflight] });

  router
    .get('/', () => json({ message: 'Course Materials RAG System', status: 'running' }))

    .post('/api/query', async (request: IRequest) => {
      let body: unknown;
      try {
        body = await request.json();
      } catch {
        return detail(422, 'Request body must be valid JSON');
      }

      const parsed = queryBodySchema.safeParse(body);
      if (!parsed.success) {
        return detail(422, parsed.error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`).join('; '));
      }

      try {
        const result = await rag.query(parsed.data.query, parsed.data.session_id ?? undefined);
        return json({
          answer: result.answer,
          sources: result.sources,
          session_id: result.sessionId,
        });
      } catch (error) {
        console.error('[Server] Query failed:', errorMessage(error));
        return detail(500, errorMessage(error));
      }
    })

    .get('/api/courses', () => {
      const analytics = rag.getCourseAnalytics();
      return json({
        total_courses: analytics.totalCourses,
        course_titles: analytics.courseTitles,
      });
    })

    .delete('/api/session/:id', ({ params }: IRequest) => {
      const id = decodeURIComponent(params.id);
      return rag.sessions.deleteSession(id)
        ? json({ status: 'success', message: `Session ${id} deleted` })
        : json({ status: 'not_found', message: `Session ${id} not found` });
    });

  return async (request: Request): Promise<Response> => {
    try {
      const response: Response | undefined = await router.fetch(request);
      return corsify(response ?? detail(404, 'Not Found'), request);
    } catch (error) {
      console.error('[Server] Unhandled error:', errorMessage(error));
      return corsify(detail(500, errorMessage(error)), request);
    }
  };
}
