import crypto from "node:crypto";
import express, { type NextFunction, type Request, type Response } from "express";
import { LoadError } from "./errors";
import { askInputSchema } from "./validators";
import type { AskOutcome, ProductAssistant } from "./assistant";
import type { CatalogStore } from "./catalog";
import type { ConversationEntry, SessionStore } from "./state";

declare global {
  namespace Express {
    interface Request {
      requestId: string;
    }
  }
}

interface AppDeps {
  catalog: CatalogStore;
  sessions: SessionStore;
  assistant: ProductAssistant;
}

const OUTCOME_STATUS: Record<AskOutcome["status"], number> = {
  answered: 200,
  empty_input: 400,
  not_found: 404,
  load_error: 409,
  session_ended: 410,
};

function bodyParserError(err: unknown): { status: number; message: string } | null {
  if (typeof err !== "object" || err === null || !("type" in err)) return null;
  if (err.type === "entity.parse.failed") return { status: 400, message: "Malformed request body" };
  if (err.type === "entity.too.large") return { status: 413, message: "Request body too large" };
  if ("status" in err && typeof err.status === "number" && err.status >= 400 && err.status < 500) {
    return { status: err.status, message: "Unsupported request body" };
  }
  return null;
}

function numbered(history: ConversationEntry[]) {
  return history.map((entry, i) => ({ index: i + 1, question: entry.question, answer: entry.answer }));
}

export function createApp({ catalog, sessions, assistant }: AppDeps): express.Express {
  const app = express();

  app.use((req: Request, _res: Response, next: NextFunction) => {
    req.requestId = crypto.randomUUID().slice(0, 8);
    console.log(`[REQ] method=${req.method} path=${req.path} request_id=${req.requestId}`);
    next();
  });

  app.use(express.json({ limit: "64kb" }));

  app.get("/health", (_req, res) => {
    const current = catalog.current;
    return res.status(200).json({
      ok: true,
      uptime: process.uptime(),
      ts: new Date().toISOString(),
      catalog: {
        loaded: current !== null,
        source: current?.source ?? null,
        count: current?.records.length ?? 0,
      },
    });
  });

  app.get("/products", (req, res) => {
    if (!catalog.current) {
      return res
        .status(409)
        .json({ error: true, status: "load_error", message: "No product catalog is loaded", request_id: req.requestId });
    }
    return res.status(200).json({ products: catalog.productNames() });
  });

  app.post("/catalog", express.text({ type: ["text/csv", "text/plain"], limit: "5mb" }), (req, res, next) => {
    try {
      if (typeof req.body !== "string" || req.body.length === 0) {
        return res
          .status(400)
          .json({ error: true, message: "Expected a CSV body (text/csv)", request_id: req.requestId });
      }

      const loaded = catalog.loadCsv(req.body, `upload:${req.requestId}`);
      console.log("CATALOG_LOADED", { request_id: req.requestId, source: loaded.source, count: loaded.records.length });
      return res.status(200).json({ ok: true, count: loaded.records.length, request_id: req.requestId });
    } catch (error) {
      if (error instanceof LoadError) {
        console.warn("CATALOG_ERR", { request_id: req.requestId, message: error.message });
        return res.status(422).json({
          error: true,
          status: error.code,
          message: error.message,
          missing_columns: error.missingColumns,
          request_id: req.requestId,
        });
      }
      return next(error);
    }
  });

  app.post("/sessions", async (_req, res, next) => {
    try {
      const session = await sessions.create();
      return res.status(201).json({ session_id: session.id });
    } catch (error) {
      return next(error);
    }
  });

  app.get("/sessions/:id/history", async (req, res, next) => {
    try {
      const session = await sessions.get(req.params.id);
      if (!session) {
        return res.status(404).json({ error: true, message: "Unknown session", request_id: req.requestId });
      }
      return res.status(200).json({ history: numbered(session.log.entries()) });
    } catch (error) {
      return next(error);
    }
  });

  app.delete("/sessions/:id", async (req, res, next) => {
    try {
      const removed = await sessions.delete(req.params.id);
      if (!removed) {
        return res.status(404).json({ error: true, message: "Unknown session", request_id: req.requestId });
      }
      return res.status(204).end();
    } catch (error) {
      return next(error);
    }
  });

  app.post("/sessions/:id/ask", async (req, res, next) => {
    try {
      const session = await sessions.get(req.params.id);
      if (!session) {
        return res.status(404).json({ error: true, message: "Unknown session", request_id: req.requestId });
      }

      const inputParsed = askInputSchema.safeParse(req.body);
      if (!inputParsed.success) {
        return res.status(400).json({ error: true, request_id: req.requestId, details: inputParsed.error.flatten() });
      }

      console.log("ASK_IN", {
        request_id: req.requestId,
        product: inputParsed.data.product.slice(0, 80),
        question: inputParsed.data.question.slice(0, 200),
      });

      const outcome = await assistant.ask(session, inputParsed.data, req.requestId);

      console.log("ASK_OUT", {
        request_id: req.requestId,
        status: outcome.status,
        answer: outcome.status === "answered" ? outcome.entry.answer.slice(0, 80) : undefined,
      });

      if (outcome.status === "answered") {
        return res.status(200).json({
          status: outcome.status,
          product: outcome.product,
          answer: outcome.entry.answer,
          history: numbered(outcome.history),
          request_id: req.requestId,
        });
      }
      return res.status(OUTCOME_STATUS[outcome.status]).json({ error: true, ...outcome, request_id: req.requestId });
    } catch (error) {
      return next(error);
    }
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const rejected = bodyParserError(err);
    if (rejected) {
      console.warn("BODY_ERR", { request_id: req.requestId, status: rejected.status });
      return res.status(rejected.status).json({ error: true, message: rejected.message, request_id: req.requestId });
    }

    console.error("UNHANDLED_ERR", {
      request_id: req.requestId,
      message: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });

    return res.status(500).json({
      error: true,
      message: err instanceof Error ? err.message : "Internal server error",
      request_id: req.requestId,
    });
  });

  return app;
}
