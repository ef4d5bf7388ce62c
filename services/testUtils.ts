import type { Course, CourseChunk } from '../types';
import { type Embedder, tokenize } from './embeddings';
import type { DecisionRequest, ModelAction, ModelClient, ModelRequest } from './geminiService';
import type { VectorStore } from './vectorStore';

/**
 * One dimension per known word. Similarities in tests can then be worked
 * out by hand; words outside the vocabulary are ignored.
 */
export class VocabularyEmbedder implements Embedder {
  readonly modelName = 'vocabulary-test';
  failing = false;
  calls = 0;
  /** Fail only the nth call to embed, counting from 1. */
  failOnCall?: number;

  constructor(private readonly vocabulary: string[]) {}

  async embed(texts: string[]): Promise<number[][]> {
    this.calls++;
    if (this.failing || this.calls === this.failOnCall) throw new Error('embedding backend unavailable');
    return texts.map(text => {
      const tokens = tokenize(text);
      return this.vocabulary.map(word => tokens.filter(t => t === word).length);
    });
  }
}

export const TEST_VOCABULARY = ['introduction', 'mcp', 'reliable', 'queues', 'server', 'client', 'retries', 'dead', 'letter'];

export const MCP_COURSE: Course = {
  title: 'Introduction to MCP',
  link: 'https://example.com/mcp',
  instructor: 'Test Instructor',
  lessons: [
    { number: 1, title: 'Servers', link: 'https://example.com/mcp/1' },
    { number: 2, title: 'Clients' },
  ],
};

export const QUEUES_COURSE: Course = {
  title: 'Reliable Queues',
  lessons: [{ number: 1, title: 'Retries' }],
};

export const SEED_CHUNKS: CourseChunk[] = [
  { content: 'MCP server basics', courseTitle: MCP_COURSE.title, lessonNumber: 1, chunkIndex: 0 },
  { content: 'MCP client basics', courseTitle: MCP_COURSE.title, lessonNumber: 2, chunkIndex: 1 },
  { content: 'Queue retries and dead letter handling', courseTitle: QUEUES_COURSE.title, lessonNumber: 1, chunkIndex: 0 },
];

export async function seedCourses(store: VectorStore): Promise<void> {
  await store.addCourseMetadata(MCP_COURSE);
  await store.addCourseMetadata(QUEUES_COURSE);
  await store.addCourseContent(SEED_CHUNKS);
}

/** Replays queued decisions and records every request it receives. */
export class ScriptedModel implements ModelClient {
  readonly decisions: DecisionRequest[] = [];
  readonly syntheses: ModelRequest[] = [];
  private readonly script: Array<ModelAction | Error>;

  constructor(script: Array<ModelAction | Error>, private readonly finalAnswer = 'final answer') {
    this.script = [...script];
  }

  async decide(request: DecisionRequest): Promise<ModelAction> {
    this.decisions.push({ ...request, transcript: [...request.transcript] });
    const next = this.script.shift();
    if (!next) throw new Error('ScriptedModel ran out of decisions');
    if (next instanceof Error) throw next;
    return next;
  }

  async synthesize(request: ModelRequest): Promise<string> {
    this.syntheses.push({ ...request, transcript: [...request.transcript] });
    return this.finalAnswer;
  }
}
