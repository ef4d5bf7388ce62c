import { type GenerativeModel, GoogleGenerativeAI } from "@google/generative-ai";

export interface Embedder {
  readonly modelName: string;
  embed(texts: string[]): Promise<number[][]>;
}

/** Cosine similarity between two vectors; 0 when either is all zeros or sizes differ */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) return 0;
  let dot = 0, magA = 0, magB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    magA += a[i] * a[i];
    magB += b[i] * b[i];
  }
  const denom = Math.sqrt(magA) * Math.sqrt(magB);
  return denom === 0 ? 0 : dot / denom;
}

export const tokenize = (text: string): string[] =>
  text.toLowerCase().split(/[^a-z0-9]+/).filter(t => t.length > 1);

// ─── Gemini Embeddings ─────────────────────────────────────

export class GeminiEmbedder implements Embedder {
  private readonly model: GenerativeModel;

  constructor(
    apiKey: string,
    readonly modelName = "text-embedding-004",
    private readonly batchSize = 50
  ) {
    this.model = new GoogleGenerativeAI(apiKey).getGenerativeModel({ model: modelName });
  }

  async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const result = await this.model.batchEmbedContents({
        requests: batch.map(text => ({ content: { role: "user", parts: [{ text }] } })),
      });
      if (result.embeddings.length !== batch.length) {
        throw new Error(`Embedding count mismatch: sent ${batch.length}, got ${result.embeddings.length}`);
      }
      vectors.push(...result.embeddings.map(e => e.values));
    }
    console.log(`[Embeddings] Embedded ${vectors.length} texts with ${this.modelName}`);
    return vectors;
  }
}

// ─── Keyword Fallback ──────────────────────────────────────
// Hashed bag of words. Lets the index work without an API key,
// at the cost of matching words rather than meaning.

const fnv1a = (token: string): number => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
};

export class KeywordEmbedder implements Embedder {
  readonly modelName = "keyword-fallback";

  constructor(private readonly dimensions = 512) {}

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map(text => this.vectorize(text));
  }

  private vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      vector[fnv1a(token) % this.dimensions] += 1;
    }
    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map(v => v / norm);
  }
}

export function createEmbedder(apiKey: string, modelName: string): Embedder {
  if (!apiKey) {
    console.warn("[Embeddings] No Gemini API key found, falling back to keyword embeddings");
    return new KeywordEmbedder();
  }
  return new GeminiEmbedder(apiKey, modelName);
}
