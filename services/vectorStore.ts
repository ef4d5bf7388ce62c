/**
 * ============================================================
 *  Vector Store — course catalog + course content collections
 * ============================================================
 *
 *   course_catalog   one record per course (id = course title),
 *                    embedded on the title, used to resolve fuzzy
 *                    course names ("MCP" → "Introduction to MCP")
 *   course_content   one record per chunk
 *                    (id = `${courseTitle}_${chunkIndex}`)
 *
 * Both collections live in memory and are written to JSON files
 * under the configured directory after every change, each through a
 * temporary file renamed into place.
 * ============================================================
 */

import { mkdir, readFile, rename, writeFile } from "fs/promises";
import path from "path";
import { z } from "zod";
import type { Course, CourseChunk, Lesson } from "../types";
import { cosineSimilarity, type Embedder } from "./embeddings";

// ─── Types ─────────────────────────────────────────────────

export interface CatalogMetadata {
  title: string;
  instructor?: string;
  courseLink?: string;
  lessonsJson: string;
  lessonCount: number;
}

export interface ChunkMetadata {
  courseTitle: string;
  lessonNumber?: number;
  chunkIndex: number;
}

export interface SearchHit {
  content: string;
  metadata: ChunkMetadata;
  distance: number;
}

export type SearchOutcome =
  | { kind: "results"; hits: SearchHit[] }
  | { kind: "empty" }
  | { kind: "unresolved"; message: string }
  | { kind: "error"; message: string };

export interface ChunkFilter {
  courseTitle?: string;
  lessonNumber?: number;
}

export interface VectorStoreOptions {
  embedder: Embedder;
  maxResults?: number;
  courseMatchThreshold?: number;
  /** Directory for the JSON collections. Omit to keep the store in memory only. */
  persistDir?: string;
}

// ─── Persisted shapes ──────────────────────────────────────

const catalogMetadataSchema = z.object({
  title: z.string(),
  instructor: z.string().optional(),
  courseLink: z.string().optional(),
  lessonsJson: z.string(),
  lessonCount: z.number().int(),
});

const chunkMetadataSchema = z.object({
  courseTitle: z.string(),
  lessonNumber: z.number().int().optional(),
  chunkIndex: z.number().int(),
});

const recordSchema = <M extends z.ZodTypeAny>(metadata: M) =>
  z.object({
    id: z.string(),
    document: z.string(),
    embedding: z.array(z.number()),
    metadata,
  });

const lessonsSchema = z.array(
  z.object({
    number: z.number().int(),
    title: z.string(),
    link: z.string().optional(),
  })
);

interface StoredRecord<M> {
  id: string;
  document: string;
  embedding: number[];
  metadata: M;
}

// ─── Collection ────────────────────────────────────────────

class Collection<M> {
  private records = new Map<string, StoredRecord<M>>();

  constructor(
    readonly name: string,
    private readonly schema: z.ZodType<StoredRecord<M>, z.ZodTypeDef, unknown>
  ) {}

  get size(): number {
    return this.records.size;
  }

  upsert(records: StoredRecord<M>[]): void {
    for (const record of records) {
      this.records.set(record.id, record);
    }
  }

  get(id: string): StoredRecord<M> | undefined {
    return this.records.get(id);
  }

  all(): StoredRecord<M>[] {
    return Array.from(this.records.values());
  }

  clear(): void {
    this.records.clear();
  }

  /** Nearest neighbours by cosine distance, closest first */
  query(
    embedding: number[],
    limit: number,
    where?: (metadata: M) => boolean
  ): Array<{ record: StoredRecord<M>; distance: number }> {
    const results: Array<{ record: StoredRecord<M>; distance: number }> = [];
    for (const record of this.records.values()) {
      if (where && !where(record.metadata)) continue;
      results.push({ record, distance: 1 - cosineSimilarity(embedding, record.embedding) });
    }
    return results
      .sort((a, b) => a.distance - b.distance)
      .slice(0, limit);
  }

  serialize(): string {
    return JSON.stringify(this.all());
  }

  restore(raw: string): void {
    const parsed = z.array(this.schema).parse(JSON.parse(raw));
    this.records = new Map(parsed.map(record => [record.id, record]));
  }
}

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const chunkId = (chunk: Pick<CourseChunk, "courseTitle" | "chunkIndex">): string =>
  `${chunk.courseTitle}_${chunk.chunkIndex}`;

/** Both conditions must hold when both are set */
export function matchesFilter(metadata: ChunkMetadata, filter?: ChunkFilter): boolean {
  if (!filter) return true;
  if (filter.courseTitle !== undefined && metadata.courseTitle !== filter.courseTitle) return false;
  if (filter.lessonNumber !== undefined && metadata.lessonNumber !== filter.lessonNumber) return false;
  return true;
}

const catalogRecord = (course: Course, embedding: number[]): StoredRecord<CatalogMetadata> => ({
  id: course.title,
  document: course.title,
  embedding,
  metadata: {
    title: course.title,
    instructor: course.instructor,
    courseLink: course.link,
    lessonsJson: JSON.stringify(course.lessons),
    lessonCount: course.lessons.length,
  },
});

const contentRecord = (chunk: CourseChunk, embedding: number[]): StoredRecord<ChunkMetadata> => ({
  id: chunkId(chunk),
  document: chunk.content,
  embedding,
  metadata: {
    courseTitle: chunk.courseTitle,
    lessonNumber: chunk.lessonNumber,
    chunkIndex: chunk.chunkIndex,
  },
});

// ─── Vector Store ──────────────────────────────────────────

export class VectorStore {
  private readonly embedder: Embedder;
  private readonly maxResults: number;
  private readonly courseMatchThreshold: number;
  private readonly persistDir?: string;
  private readonly catalog = new Collection<CatalogMetadata>(
    "course_catalog",
    recordSchema(catalogMetadataSchema)
  );
  private readonly content = new Collection<ChunkMetadata>(
    "course_content",
    recordSchema(chunkMetadataSchema)
  );
  private writeChain: Promise<void> = Promise.resolve();

  constructor(options: VectorStoreOptions) {
    this.embedder = options.embedder;
    this.maxResults = options.maxResults ?? 5;
    this.courseMatchThreshold = options.courseMatchThreshold ?? 0.5;
    this.persistDir = options.persistDir;
  }

  get embeddingModel(): string {
    return this.embedder.modelName;
  }

  /** Load persisted collections. Missing files mean an empty store. */
  async load(): Promise<void> {
    if (!this.persistDir) return;
    for (const collection of [this.catalog, this.content]) {
      const file = path.join(this.persistDir, `${collection.name}.json`);
      try {
        collection.restore(await readFile(file, "utf8"));
      } catch (error) {
        if (isMissingFile(error)) continue;
        throw new Error(`Failed to load ${collection.name} from ${file}: ${errorMessage(error)}`);
      }
    }
    console.log(`[VectorStore] Loaded ${this.catalog.size} courses, ${this.content.size} chunks`);
  }

  /**
   * Index a course and its chunks together. Everything is embedded before
   * either collection changes, so a failed embedding leaves no trace of the
   * course and a later load can retry it.
   */
  async addCourse(course: Course, chunks: CourseChunk[]): Promise<void> {
    const [titleEmbedding] = await this.embedder.embed([course.title]);
    const chunkEmbeddings = chunks.length > 0
      ? await this.embedder.embed(chunks.map(c => c.content))
      : [];
    this.catalog.upsert([catalogRecord(course, titleEmbedding)]);
    this.content.upsert(chunks.map((chunk, i) => contentRecord(chunk, chunkEmbeddings[i])));
    await this.persist();
  }

  async addCourseMetadata(course: Course): Promise<void> {
    const [embedding] = await this.embedder.embed([course.title]);
    this.catalog.upsert([catalogRecord(course, embedding)]);
    await this.persist();
  }

  async addCourseContent(chunks: CourseChunk[]): Promise<void> {
    if (chunks.length === 0) return;
    const embeddings = await this.embedder.embed(chunks.map(c => c.content));
    this.content.upsert(chunks.map((chunk, i) => contentRecord(chunk, embeddings[i])));
    await this.persist();
  }

  addChunks(chunks: CourseChunk[]): Promise<void> {
    return this.addCourseContent(chunks);
  }

  /**
   * Filtered semantic search over course content. Never throws: a course
   * name that matches nothing, an empty result and an index failure each
   * come back as their own outcome.
   */
  async search(
    query: string,
    courseName?: string,
    lessonNumber?: number,
    limit?: number
  ): Promise<SearchOutcome> {
    try {
      let courseTitle: string | undefined;
      if (courseName) {
        courseTitle = await this.nearestCourse(courseName);
        if (!courseTitle) {
          return { kind: "unresolved", message: `No course found matching '${courseName}'` };
        }
      }

      const filter = courseTitle === undefined && lessonNumber === undefined
        ? undefined
        : { courseTitle, lessonNumber };
      const [embedding] = await this.embedder.embed([query]);
      const matches = this.content.query(
        embedding,
        limit ?? this.maxResults,
        metadata => matchesFilter(metadata, filter)
      );

      if (matches.length === 0) return { kind: "empty" };
      return {
        kind: "results",
        hits: matches.map(({ record, distance }) => ({
          content: record.document,
          metadata: record.metadata,
          distance,
        })),
      };
    } catch (error) {
      console.error("[VectorStore] Search failed:", errorMessage(error));
      return { kind: "error", message: `Search error: ${errorMessage(error)}` };
    }
  }

  /** Exact indexed title for a fuzzy course name, or undefined */
  async resolveCourseName(courseName: string): Promise<string | undefined> {
    try {
      return await this.nearestCourse(courseName);
    } catch (error) {
      console.warn(`[VectorStore] Course name resolution failed for "${courseName}":`, errorMessage(error));
      return undefined;
    }
  }

  getExistingCourseTitles(): string[] {
    return this.catalog.all().map(r => r.metadata.title);
  }

  getCourseCount(): number {
    return this.catalog.size;
  }

  getAllCoursesMetadata(): Course[] {
    return this.catalog.all().map(r => this.toCourse(r.metadata));
  }

  getCourseOutline(courseTitle: string): Course | undefined {
    const record = this.catalog.get(courseTitle);
    return record ? this.toCourse(record.metadata) : undefined;
  }

  getCourseLink(courseTitle: string): string | undefined {
    return this.catalog.get(courseTitle)?.metadata.courseLink;
  }

  getLessonLink(courseTitle: string, lessonNumber: number): string | undefined {
    return this.getCourseOutline(courseTitle)?.lessons.find(l => l.number === lessonNumber)?.link;
  }

  async clear(): Promise<void> {
    this.catalog.clear();
    this.content.clear();
    await this.persist();
    console.log("[VectorStore] Cleared all collections");
  }

  private async nearestCourse(courseName: string): Promise<string | undefined> {
    if (this.catalog.size === 0) return undefined;
    const [embedding] = await this.embedder.embed([courseName]);
    const [best] = this.catalog.query(embedding, 1);
    if (!best) return undefined;
    const similarity = 1 - best.distance;
    if (similarity < this.courseMatchThreshold) {
      console.log(`[VectorStore] "${courseName}" is closest to "${best.record.metadata.title}" (similarity ${similarity.toFixed(3)}), below threshold`);
      return undefined;
    }
    return best.record.metadata.title;
  }

  private toCourse(metadata: CatalogMetadata): Course {
    let lessons: Lesson[] = [];
    try {
      lessons = lessonsSchema.parse(JSON.parse(metadata.lessonsJson));
    } catch (error) {
      console.warn(`[VectorStore] Unreadable lesson list for "${metadata.title}":`, errorMessage(error));
    }
    return {
      title: metadata.title,
      link: metadata.courseLink,
      instructor: metadata.instructor,
      lessons,
    };
  }

  private persist(): Promise<void> {
    const dir = this.persistDir;
    if (!dir) return Promise.resolve();
    const snapshot = [this.catalog, this.content].map(c => ({ name: c.name, body: c.serialize() }));
    const write = this.writeChain.then(async () => {
      await mkdir(dir, { recursive: true });
      for (const { name, body } of snapshot) {
        const file = path.join(dir, `${name}.json`);
        // Readers only ever see a complete file.
        await writeFile(`${file}.tmp`, body, "utf8");
        await rename(`${file}.tmp`, file);
      }
    });
    // A failed write must not block the writes queued behind it.
    this.writeChain = write.catch(() => undefined);
    return write;
  }
}
