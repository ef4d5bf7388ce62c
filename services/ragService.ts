/**
 * ============================================================
 *  RAG System — query orchestration and course ingestion
 * ============================================================
 *
 *   query → history → decision call ─┬─ answer ─────────────────┐
 *                                    └─ tool calls → results ─┐ │
 *            ┌── rounds left: decision call again ◄───────────┤ │
 *            └── cap reached: synthesis call (no tools) ◄─────┘ │
 *   record exchange → collect sources → reply  ◄────────────────┘
 *
 * Each query gets its own tool registry, so citations from one
 * request never end up attached to another.
 * ============================================================
 */

import { readdir } from "fs/promises";
import path from "path";
import { STATE_METADATA, SUPPORTED_EXTENSIONS } from "../constants";
import { type Course, type CourseAnalytics, type QueryResult, QueryState, type Source } from "../types";
import type { DocumentProcessor } from "./documentProcessor";
import type { ModelClient, ToolOutput, TranscriptEntry } from "./geminiService";
import { createCourseToolRegistry, mergeSources, type ToolRegistry } from "./searchTools";
import type { SessionManager } from "./sessionManager";
import type { VectorStore } from "./vectorStore";

export interface RagSystemOptions {
  store: VectorStore;
  model: ModelClient;
  sessions: SessionManager;
  documents: DocumentProcessor;
  maxToolRounds?: number;
  /** Override for tests; defaults to the course search + outline tools. */
  createRegistry?: (store: VectorStore) => ToolRegistry;
}

export interface IngestResult {
  course: Course;
  chunkCount: number;
}

export class RagSystem {
  readonly store: VectorStore;
  readonly sessions: SessionManager;
  private readonly model: ModelClient;
  private readonly documents: DocumentProcessor;
  private readonly maxToolRounds: number;
  private readonly createRegistry: (store: VectorStore) => ToolRegistry;

  constructor(options: RagSystemOptions) {
    this.store = options.store;
    this.model = options.model;
    this.sessions = options.sessions;
    this.documents = options.documents;
    this.maxToolRounds = Math.max(1, options.maxToolRounds ?? 2);
    this.createRegistry = options.createRegistry ?? createCourseToolRegistry;
  }

  // ─── Ingestion ───────────────────────────────────────────

  /** Index one course file. Returns null when its title is already indexed. */
  async addCourseDocument(filePath: string): Promise<IngestResult | null> {
    const { course, chunks } = await this.documents.processCourseDocument(filePath);
    if (this.store.getExistingCourseTitles().includes(course.title)) {
      console.log(`[RAG] Course already indexed, skipping: ${course.title}`);
      return null;
    }
    await this.store.addCourse(course, chunks);
    console.log(`[RAG] Added course "${course.title}": ${course.lessons.length} lessons, ${chunks.length} chunks`);
    return { course, chunkCount: chunks.length };
  }

  async addCourseFolder(
    folder: string,
    options: { clearExisting?: boolean } = {}
  ): Promise<{ courses: number; chunks: number }> {
    if (options.clearExisting) {
      await this.store.clear();
    }

    const entries = await readdir(folder, { withFileTypes: true });
    const files = entries
      .filter(e => e.isFile() && SUPPORTED_EXTENSIONS.includes(path.extname(e.name).toLowerCase()))
      .map(e => e.name)
      .sort();

    let courses = 0;
    let chunks = 0;
    for (const file of files) {
      try {
        const added = await this.addCourseDocument(path.join(folder, file));
        if (added) {
          courses++;
          chunks += added.chunkCount;
        }
      } catch (error) {
        console.error(`[RAG] Failed to ingest ${file}:`, error instanceof Error ? error.message : error);
      }
    }
    console.log(`[RAG] Folder ${folder}: ${courses} new courses, ${chunks} chunks`);
    return { courses, chunks };
  }

  getCourseAnalytics(): CourseAnalytics {
    return {
      totalCourses: this.store.getCourseCount(),
      courseTitles: this.store.getExistingCourseTitles(),
    };
  }

  // ─── Query ───────────────────────────────────────────────

  /**
   * Answer a question, calling course tools if the model asks for them.
   * Model and tool failures propagate to the caller unchanged.
   */
  async query(text: string, sessionId?: string): Promise<QueryResult> {
    const id = sessionId ?? this.sessions.createSession();
    return this.sessions.runExclusive(id, () => this.runQuery(text, id));
  }

  private async runQuery(text: string, sessionId: string): Promise<QueryResult> {
    const trace: QueryState[] = [];
    const enter = (state: QueryState) => {
      trace.push(state);
      console.log(`[RAG] ${STATE_METADATA[state].label}`);
    };

    const registry = this.createRegistry(this.store);
    const tools = registry.getToolDefinitions();
    const history = this.sessions.getConversationHistory(sessionId);
    const transcript: TranscriptEntry[] = [{ role: "user", text }];
    const sources: Source[] = [];

    enter(QueryState.AWAITING_DECISION);
    let action = await this.model.decide({ history, transcript, tools });
    let answer: string;
    let round = 0;

    if (action.kind === "answer") {
      enter(QueryState.DIRECT_ANSWER);
      answer = action.text;
    } else {
      for (;;) {
        round++;
        enter(QueryState.TOOL_EXECUTING);
        transcript.push({ role: "tool_calls", calls: action.calls, content: action.content });

        // Sequential on purpose: a later call may depend on an earlier result.
        const results: ToolOutput[] = [];
        for (const call of action.calls) {
          const result = await registry.execute(call.name, call.args);
          mergeSources(sources, result.sources);
          results.push({ name: call.name, output: result.output });
        }
        transcript.push({ role: "tool_results", results });

        if (round >= this.maxToolRounds) {
          console.log(`[RAG] Tool round limit (${this.maxToolRounds}) reached, asking for a final answer`);
          answer = await this.model.synthesize({ history, transcript });
          break;
        }

        enter(QueryState.AWAITING_DECISION);
        action = await this.model.decide({ history, transcript, tools });
        if (action.kind === "answer") {
          answer = action.text;
          break;
        }
      }
    }

    this.sessions.addExchange(sessionId, text, answer);
    registry.resetSources();
    enter(QueryState.DONE);

    return { answer, sources, sessionId, trace };
  }
}
