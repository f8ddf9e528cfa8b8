import express, { NextFunction, Request, RequestHandler, Response } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import {
  Detector,
  Logger,
  RegexSentenceTokenizer,
  SentenceTokenizer,
  SpanBatch,
  WinkSentenceTokenizer,
  collectSpans,
  extractDiffSpans,
  getLogger,
  isTextGuardError,
  mergeSpans,
  reconstruct,
  resolveScanConfig,
  segmentSentences,
  toBatch,
} from "@textguard/core";
import { ApiConfig } from "./config";
import { DiffBody, MergeBody, ReconstructBody, RedactBody, RedactSource, SentencesBody } from "./schemas";

export interface AppDeps {
  config: ApiConfig;
  tokenizer?: SentenceTokenizer;
  logger?: Logger;
}

function requestLog(base: Logger, res: Response): Logger {
  const id: unknown = res.locals.requestId;
  return base.child({ request_id: typeof id === "string" ? id : undefined });
}

// Parses the JSON body; async handler failures go to the error middleware
function route<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  handler: (body: T, req: Request, res: Response) => unknown
): RequestHandler {
  return (req, res, next) => {
    const parsed = schema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "invalid_request", issues: parsed.error.issues });
      return;
    }
    Promise.resolve()
      .then(() => handler(parsed.data, req, res))
      .catch(next);
  };
}

function requireApiKey(keys: string[]): RequestHandler {
  return (req, res, next) => {
    if (!keys.length) return next();
    const auth = req.header("authorization");
    const bearer = auth && /^bearer\s+/i.test(auth) ? auth.replace(/^bearer\s+/i, "").trim() : undefined;
    const provided = req.header("x-api-key") ?? bearer;
    if (provided && keys.includes(provided)) return next();
    res.status(401).json({ error: "unauthorized", message: "invalid or missing API key" });
  };
}

// Caller-supplied detector output wrapped as a detector, so it goes through
// the same normalization as a live one.
function toDetector(src: RedactSource): Detector {
  if ("censored" in src) {
    const { censored } = src;
    return { capability: "censor", name: src.source, tier: src.tier, kind: src.kind, censor: () => censored };
  }
  const { spans } = src;
  return { capability: "offsets", name: src.source, tier: src.tier, detect: () => spans };
}

function httpStatusOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") return err.status;
  return undefined;
}

export function createApp(deps: AppDeps): express.Express {
  const { config } = deps;
  const logger = deps.logger ?? getLogger("api");
  const tokenizer = deps.tokenizer ?? (config.sentenceTokenizer === "regex" ? new RegexSentenceTokenizer() : new WinkSentenceTokenizer());

  const app = express();
  app.use(express.json({ limit: config.bodyLimit }));
  app.use(cors({ origin: config.corsOrigins }));
  app.use(helmet());
  // Successful requests are not access-logged
  app.use(morgan("dev", { skip: (_req, res) => res.statusCode < 400 }));
  app.use((req, res, next) => {
    const requestId = req.header("x-request-id") || uuidv4();
    res.locals.requestId = requestId;
    res.setHeader("x-request-id", requestId);
    next();
  });

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.use(requireApiKey(config.apiKeys));

  app.post("/spans/merge", route(MergeBody, ({ text, batches }, _req, res) => {
    res.json({ spans: mergeSpans(text, batches) });
  }));

  app.post("/text/reconstruct", route(ReconstructBody, ({ text, spans, policy, token }, _req, res) => {
    res.json({ text: reconstruct(text, spans, policy, { token: token ?? config.redactToken }) });
  }));

  app.post("/text/sentences", route(SentencesBody, ({ text }, _req, res) => {
    res.json({ sentences: segmentSentences(text, tokenizer) });
  }));

  app.post("/spans/diff", route(DiffBody, ({ original, transformed, kind, source, replacement }, _req, res) => {
    res.json({ spans: extractDiffSpans(original, transformed, { kind, source, replacement }) });
  }));

  app.post("/redact", route(RedactBody, async (body, _req, res) => {
    const { text, sources, policy } = body;
    if (!text.trim()) {
      res.json({ status: "pass", text, spans: [] });
      return;
    }
    const scan = resolveScanConfig(
      { placeholders: config.placeholders, thresholds: config.thresholds },
      { placeholders: body.placeholders, thresholds: body.thresholds }
    );
    const batches: SpanBatch[] = [];
    for (const src of sources) {
      const detector = toDetector(src);
      const spans = await collectSpans(text, detector, scan);
      batches.push(toBatch(detector, spans.filter((s) => s.score >= scan.thresholdFor(s.kind))));
    }
    const merged = mergeSpans(text, batches);
    const out = reconstruct(text, merged, policy, { token: body.token ?? config.redactToken });
    requestLog(logger, res).info("redact.done", { sources: sources.length, spans: merged.length, policy });
    res.json({ status: merged.length ? "fixed" : "pass", text: out, spans: merged });
  }));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isTextGuardError(err)) {
      res.status(422).json({ error: err.code, message: err.message, details: err.details });
      return;
    }
    const status = httpStatusOf(err);
    if (status !== undefined && status >= 400 && status < 500) {
      res.status(status).json({ error: "invalid_request", message: err instanceof Error ? err.message : String(err) });
      return;
    }
    requestLog(logger, res).error("api.error", { error: err instanceof Error ? err.message : String(err) });
    res.status(500).json({ error: "internal_error" });
  });

  return app;
}
