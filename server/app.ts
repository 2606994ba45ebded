import path from "node:path";

import cors from "@fastify/cors";
import multipart from "@fastify/multipart";
import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";

import {
  resolveCheckSettings,
  type CheckSettingsOverrides,
} from "./config/checkDefaults";
import { env } from "./config/env";
import analysisRoutes from "./routes/analysis";
import { getOpenAIClient } from "./services/review/openaiClient";
import {
  createOpenAIReviewTransport,
  type ReviewTransport,
} from "./services/review/reviewAgent";
import { RunService } from "./services/runs/runService";
import { FileRunStore, MemoryRunStore, type RunStore } from "./services/runs/runStore";

declare module "fastify" {
  interface FastifyInstance {
    runs: RunService;
  }
}

export interface BuildAppOptions {
  logger?: FastifyServerOptions["logger"];
  store?: RunStore;
  settings?: CheckSettingsOverrides;
  sizeLimitBytes?: number;
  createReviewTransport?: (apiKey: string) => ReviewTransport;
  reviewModel?: string;
  reviewBatchSize?: number;
  reviewRetryDelayMs?: number;
  fallbackApiKey?: string;
  createRunId?: () => string;
}

const defaultStore = (): RunStore =>
  env.RUN_STORE === "memory"
    ? new MemoryRunStore()
    : new FileRunStore(path.resolve(process.cwd(), env.RUNS_DIR));

export async function buildApp(
  options: BuildAppOptions = {},
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger ?? { level: env.LOG_LEVEL },
  });

  const sizeLimitBytes =
    options.sizeLimitBytes ?? Math.round(env.UPLOAD_SIZE_LIMIT_MB * 1024 * 1024);

  const runs = new RunService({
    store: options.store ?? defaultStore(),
    logger: app.log,
    createId: options.createRunId,
    pipeline: {
      settings: resolveCheckSettings(options.settings),
      logger: app.log,
      sizeLimitBytes,
      review: {
        createTransport:
          options.createReviewTransport ??
          ((apiKey) => createOpenAIReviewTransport(getOpenAIClient(apiKey))),
        defaultModel: options.reviewModel ?? env.REVIEW_MODEL,
        batchSize: options.reviewBatchSize ?? env.REVIEW_BATCH_SIZE,
        fallbackApiKey: options.fallbackApiKey ?? env.OPENAI_API_KEY,
        retryDelayMs: options.reviewRetryDelayMs,
      },
    },
  });
  app.decorate("runs", runs);

  app.addHook("onClose", async () => {
    if (runs.activeRuns) {
      app.log.info({ active: runs.activeRuns }, "[runs] waiting for in-flight runs");
    }
    await runs.whenIdle();
  });

  await app.register(cors, {
    origin: env.CLIENT_ORIGIN ?? true,
    credentials: true,
  });
  await app.register(multipart, {
    limits: {
      fileSize: sizeLimitBytes,
      files: 3,
    },
  });
  await app.register(analysisRoutes, { sizeLimitBytes });

  return app;
}
