import { createServer } from 'http';
import { existsSync } from 'fs';
import { createServerAdapter } from '@whatwg-node/server';
import { createApiHandler } from './services/apiRouter';
import { loadConfig } from './services/config';
import { DocumentProcessor } from './services/documentProcessor';
import { createEmbedder } from './services/embeddings';
import { GeminiModelClient } from './services/geminiService';
import { RagSystem } from './services/ragService';
import { SessionManager } from './services/sessionManager';
import { VectorStore } from './services/vectorStore';

async function main(): Promise<void> {
  const config = loadConfig();

  const store = new VectorStore({
    embedder: createEmbedder(config.geminiApiKey, config.embeddingModel),
    maxResults: config.maxResults,
    courseMatchThreshold: config.courseMatchThreshold,
    persistDir: config.chromaPath,
  });
  await store.load();

  const rag = new RagSystem({
    store,
    model: new GeminiModelClient({
      apiKey: config.geminiApiKey,
      model: config.geminiModel,
      temperature: config.temperature,
      maxOutputTokens: config.maxOutputTokens,
      timeoutMs: config.modelTimeoutMs,
    }),
    sessions: new SessionManager(config.maxHistory),
    documents: new DocumentProcessor(config.chunkSize, config.chunkOverlap),
    maxToolRounds: config.maxToolRounds,
  });

  if (existsSync(config.docsPath)) {
    console.log(`[Server] Loading course documents from ${config.docsPath}`);
    await rag.addCourseFolder(config.docsPath);
  } else {
    console.warn(`[Server] Docs folder not found: ${config.docsPath}`);
  }

  const server = createServer(createServerAdapter(createApiHandler(rag)));
  server.listen(config.port, () => {
    console.log(`[Server] Listening on http://localhost:${config.port} (embeddings: ${store.embeddingModel})`);
  });
}

main().catch(error => {
  console.error('[Server] Startup failed:', error);
  process.exitCode = 1;
});
