/**
 * API Server - Express REST API
 *
 * Conversational answers and hybrid search over the document corpus.
 *
 * Key Endpoints:
 * - POST /api/rag/chat - Answer one turn
 * - POST /api/rag/chat/stream - Answer one turn as Server-Sent Events
 * - GET/DELETE /api/rag/conversations/:id - Conversation history
 * - GET/POST /api/rag/config - Runtime retrieval and timeout settings
 * - POST /api/retrieval/search - Hybrid search
 * - GET /api/retrieval/search/simple?query=... - Hybrid search from a query string
 * - POST /api/retrieval/search/batch - Up to 50 searches
 *
 * Run with: npm start
 */

import express from "express";
import type { Express, Request, Response, NextFunction } from "express";
import cors from "cors";
import helmet from "helmet";
import { z } from "zod";
import { createServices } from "../index";
import type { AppServices } from "../index";
import { loadConfig } from "../lib/config";
import type { StreamEvent } from "../lib/conversation-types";
import type { SearchRequest } from "../lib/types";
import {
  NotFoundError,
  RagError,
  ValidationError,
  errorMessage,
  httpStatusFor,
} from "../lib/errors";
import { createHealthRouter } from "../health";
import { createLogger, preview } from "../utils/logger";

const log = createLogger("API");

// ============================================================================
// Request Schemas
// ============================================================================

export const chatRequestSchema = z.object({
  message: z
    .string()
    .max(10000)
    .refine((value) => value.trim().length > 0, "message must not be empty"),
  conversationId: z.string().min(1).optional(),
  enableRetrieval: z.boolean().optional(),
  maxRetrievedChunks: z.number().int().min(1).max(20).optional(),
  similarityThreshold: z.number().min(0).max(1).optional(),
  contextStrategy: z.enum(["simple", "ranked", "hierarchical", "summarized"]).optional(),
  promptType: z.enum(["default", "analysis", "summary"]).optional(),
  maxContextLength: z.number().int().min(500).max(8000).optional(),
  includeChatHistory: z.boolean().optional(),
  maxHistoryMessages: z.number().int().min(0).max(50).optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().min(50).max(4000).optional(),
});

const filtersSchema = z.object({
  documentIds: z.array(z.string()).optional(),
  documentTypes: z.array(z.string()).optional(),
  dateRange: z
    .object({
      from: z.coerce.date().optional(),
      to: z.coerce.date().optional(),
    })
    .optional(),
  tags: z.array(z.string()).optional(),
});

// Weight ranges and the weight sum are checked by the search engine
export const searchRequestSchema = z.object({
  query: z.string(),
  nResults: z.number().optional(),
  similarityThreshold: z.number().optional(),
  filters: filtersSchema.optional(),
  mode: z.enum(["semantic", "keyword", "hybrid"]).optional(),
  keywordWeight: z.number().optional(),
  semanticWeight: z.number().optional(),
  deduplicate: z.boolean().optional(),
  highlight: z.boolean().optional(),
  includeMetadata: z.boolean().optional(),
  useCache: z.boolean().optional(),
});

export const batchSearchSchema = z.object({
  queries: z.array(z.string()).min(1).max(50),
  config: searchRequestSchema.omit({ query: true }).optional(),
  maxConcurrent: z.number().int().min(1).max(20).optional(),
});

export const ragConfigSchema = z
  .object({
    defaultSimilarityThreshold: z.number().min(0).max(1).optional(),
    fallbackResults: z.number().int().min(1).max(50).optional(),
    fallbackThreshold: z.number().min(0).max(1).optional(),
    generationTimeoutMs: z.number().int().min(1000).max(600000).optional(),
    indexTimeoutMs: z.number().int().min(100).max(120000).optional(),
  })
  .strict();

// documentTypes is comma-separated
const simpleSearchQuerySchema = z.object({
  query: z.string().refine((value) => value.trim().length > 0, "query must not be empty"),
  limit: z.coerce.number().int().min(1).max(50).default(10),
  threshold: z.coerce.number().min(0).max(1).optional(),
  mode: z.enum(["semantic", "keyword", "hybrid"]).optional(),
  documentTypes: z
    .string()
    .transform((value) =>
      value
        .split(",")
        .map((type) => type.trim())
        .filter((type) => type.length > 0)
    )
    .optional(),
});

export function simpleSearchRequest(query: unknown): SearchRequest {
  const { query: text, limit, threshold, mode, documentTypes } = parseBody(
    simpleSearchQuerySchema,
    query
  );
  return {
    query: text,
    nResults: limit,
    similarityThreshold: threshold,
    mode,
    filters: documentTypes && documentTypes.length > 0 ? { documentTypes } : undefined,
  };
}

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? issue.path.join(".") : "body";
    throw new ValidationError(
      `Invalid request${field ? ` (${field})` : ""}: ${issue?.message ?? "malformed body"}`,
      field
    );
  }
  return parsed.data;
}

export function formatSseEvent(event: StreamEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}

export const SSE_DONE = "data: [DONE]\n\n";

/**
 * Writes each event as an SSE frame, then the [DONE] marker. A thrown
 * stream becomes an error event carrying the id of the first event seen.
 */
export async function writeSseEvents(
  events: AsyncIterable<StreamEvent>,
  write: (chunk: string) => void,
  conversationId: string,
  signal: AbortSignal
): Promise<void> {
  let streamId: string | undefined;
  try {
    for await (const event of events) {
      if (signal.aborted) break;
      streamId ??= event.conversationId;
      write(formatSseEvent(event));
    }
  } catch (error) {
    log.error(`Stream failed: ${errorMessage(error)}`);
    if (!signal.aborted) {
      write(
        formatSseEvent({
          type: "error",
          conversationId: streamId ?? conversationId,
          errorMessage: errorMessage(error),
        })
      );
    }
  }

  if (!signal.aborted) {
    write(SSE_DONE);
  }
}

// ============================================================================
// Error Mapping
// ============================================================================

function sendError(res: Response, error: unknown): void {
  const status = httpStatusFor(error);
  if (status >= 500) {
    log.error(`Request failed: ${errorMessage(error)}`);
  }
  res.status(status).json({
    success: false,
    error: status === 500 ? "Internal Server Error" : errorMessage(error),
    code: error instanceof RagError ? error.code : "INTERNAL",
  });
}

type Handler = (req: Request, res: Response) => Promise<void> | void;

function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch((error: unknown) => {
        if (res.headersSent) {
          next(error);
          return;
        }
        sendError(res, error);
      });
  };
}

// ============================================================================
// App
// ============================================================================

export function createApp(services: AppServices): Express {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: true }));

  app.use("/health", createHealthRouter(services));

  // --------------------------------------------------------------------------
  // Conversations
  // --------------------------------------------------------------------------

  app.post(
    "/api/rag/chat",
    route(async (req, res) => {
      const request = parseBody(chatRequestSchema, req.body);
      log.info(`Chat request: "${preview(request.message, 100)}"`);

      const controller = new AbortController();
      res.on("close", () => {
        if (!res.writableEnded) controller.abort();
      });

      const response = await services.rag.chat(request, { signal: controller.signal });
      log.info(`Chat request done: success=${response.success}`);
      res.json(response);
    })
  );

  app.post(
    "/api/rag/chat/stream",
    route(async (req, res) => {
      const request = parseBody(chatRequestSchema, req.body);
      log.info(`Stream request: "${preview(request.message, 100)}"`);

      res.writeHead(200, {
        "Content-Type": "text/event-stream",
        "Cache-Control": "no-cache",
        Connection: "keep-alive",
      });

      // Client disconnect aborts the turn
      const controller = new AbortController();
      res.on("close", () => {
        if (!res.writableEnded) controller.abort();
      });

      // The id is fixed before streaming so a failure event can name it
      const conversationId = services.conversations.createOrGet(request.conversationId);
      await writeSseEvents(
        services.rag.streamChat({ ...request, conversationId }, { signal: controller.signal }),
        (chunk) => res.write(chunk),
        conversationId,
        controller.signal
      );

      if (!controller.signal.aborted) {
        res.end();
      }
    })
  );

  app.get(
    "/api/rag/conversations",
    route((req, res) => {
      const { limit } = parseBody(listQuerySchema, req.query);
      const conversations = services.rag.listConversations(limit);
      res.json({ success: true, conversations, total: conversations.length });
    })
  );

  app.get(
    "/api/rag/conversations/:id",
    route((req, res) => {
      const conversation = services.rag.getConversation(req.params.id);
      if (!conversation) {
        throw new NotFoundError("Conversation", req.params.id);
      }
      res.json({ success: true, conversation });
    })
  );

  app.delete(
    "/api/rag/conversations/:id",
    route((req, res) => {
      if (!services.rag.clearConversation(req.params.id)) {
        throw new NotFoundError("Conversation", req.params.id);
      }
      res.json({ success: true, message: `Conversation ${req.params.id} cleared` });
    })
  );

  app.get(
    "/api/rag/metrics",
    route((req, res) => {
      res.json({
        success: true,
        metrics: services.rag.getMetrics(),
        conversations: services.conversations.getStatistics(),
      });
    })
  );

  app.post(
    "/api/rag/metrics/reset",
    route((req, res) => {
      services.rag.resetMetrics();
      res.json({ success: true, message: "Metrics reset" });
    })
  );

  app.get(
    "/api/rag/config",
    route((req, res) => {
      res.json({ success: true, config: services.rag.getConfig() });
    })
  );

  app.post(
    "/api/rag/config",
    route((req, res) => {
      const update = parseBody(ragConfigSchema, req.body);
      const config = services.rag.updateConfig(update);
      res.json({ success: true, message: "RAG configuration updated", config });
    })
  );

  // --------------------------------------------------------------------------
  // Retrieval
  // --------------------------------------------------------------------------

  app.post(
    "/api/retrieval/search",
    route(async (req, res) => {
      const request = parseBody(searchRequestSchema, req.body);
      res.json(await services.search.search(request));
    })
  );

  app.get(
    "/api/retrieval/search/simple",
    route(async (req, res) => {
      res.json(await services.search.search(simpleSearchRequest(req.query)));
    })
  );

  app.post(
    "/api/retrieval/search/batch",
    route(async (req, res) => {
      const { queries, config, maxConcurrent } = parseBody(batchSearchSchema, req.body);
      res.json(await services.search.batchSearch(queries, config, maxConcurrent));
    })
  );

  app.get(
    "/api/retrieval/statistics",
    route((req, res) => {
      res.json({ success: true, statistics: services.search.getStatistics() });
    })
  );

  app.delete(
    "/api/retrieval/cache",
    route((req, res) => {
      services.search.clearCache();
      res.json({ success: true, message: "Search cache cleared" });
    })
  );

  // Root endpoint
  app.get("/", (req: Request, res: Response) => {
    res.json({
      name: "docent-rag",
      version: "1.0.0",
      status: "online",
      description: "Hybrid retrieval and conversational answers over a document corpus",
      endpoints: {
        chat: "POST /api/rag/chat",
        chatStream: "POST /api/rag/chat/stream",
        conversations: "GET /api/rag/conversations",
        config: "GET/POST /api/rag/config",
        search: "POST /api/retrieval/search",
        simpleSearch: "GET /api/retrieval/search/simple",
        batchSearch: "POST /api/retrieval/search/batch",
        health: "GET /health",
      },
    });
  });

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: "Not Found",
      message: `Route ${req.method} ${req.path} not found`,
    });
  });

  // Error handler
  app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    log.error(`Unhandled error: ${err.message}`);
    if (res.headersSent) {
      next(err);
      return;
    }
    sendError(res, err);
  });

  return app;
}

export async function startServer(port?: number): Promise<void> {
  try {
    const config = loadConfig();
    const services = createServices(config);

    if (services.storage.postgres) {
      await services.storage.postgres.initialize();
    }
    services.maintenance.start();

    const app = createApp(services);
    const listenPort = port ?? config.server.port;

    app.listen(listenPort, () => {
      log.info(`Listening on http://localhost:${listenPort}`);
      log.info(
        `Storage: ${services.storage.backend}, provider: ${services.llm.currentProvider} (${services.llm.model})`
      );
    });
  } catch (error) {
    log.error(`Failed to start server: ${errorMessage(error)}`);
    process.exit(1);
  }
}

// Start server if run directly
if (require.main === module) {
  void startServer();
}
