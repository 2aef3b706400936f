import { randomUUID } from "node:crypto";
import express from "express";
import type { AppConfig } from "./config";
import { errorMessage } from "./errors";
import type { FetchLike } from "./llm/http";
import { isTotalFailure, runComparison } from "./llm/orchestrator";
import { clampOverride } from "./llm/platform";
import { detectRuntime, selectModelPair } from "./llm/runtime";
import type { RequestOverrides } from "./types";
import type { Env } from "./utils/env";
import { safeLog } from "./utils/redact";

export type AppDeps = {
  apiKey: string;
  config: AppConfig;
  env?: Env;
  fetchImpl?: FetchLike;
};

type CompareBody = {
  prompt?: unknown;
  forceCodexRuntime?: unknown;
  maxTokens?: unknown;
  temperature?: unknown;
  timeoutSeconds?: unknown;
};

function getVersion(): string {
  return process.env.npm_package_version ?? process.env.APP_VERSION ?? "dev";
}

function optionalNumber(value: unknown): number | undefined | null {
  if (value === undefined || value === null) return undefined;
  return typeof value === "number" && Number.isFinite(value) && value > 0 ? value : null;
}

function parseOverrides(body: CompareBody): RequestOverrides | string {
  const maxTokens = optionalNumber(body.maxTokens);
  const temperature = body.temperature === 0 ? 0 : optionalNumber(body.temperature);
  const timeoutSeconds = optionalNumber(body.timeoutSeconds);
  if (maxTokens === null) return "maxTokens must be a positive number";
  if (temperature === null) return "temperature must be a non-negative number";
  if (timeoutSeconds === null) return "timeoutSeconds must be a positive number";
  return {
    maxTokens: maxTokens === undefined ? undefined : clampOverride("maxTokens", Math.floor(maxTokens)),
    temperature: temperature === undefined ? undefined : clampOverride("temperature", temperature),
    timeoutSeconds: timeoutSeconds === undefined ? undefined : clampOverride("timeoutSeconds", timeoutSeconds)
  };
}

export function createApp(deps: AppDeps) {
  const env = deps.env ?? process.env;
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.get("/api/compare/config", (_req, res) => {
    const runtime = detectRuntime(env);
    res.json({
      runtime,
      models: selectModelPair(runtime, deps.config),
      defaults: deps.config.defaults,
      platforms: deps.config.platforms
    });
  });

  app.post("/api/compare", async (req, res) => {
    const requestId = randomUUID();
    const body: CompareBody = typeof req.body === "object" && req.body !== null ? req.body : {};
    const prompt = typeof body.prompt === "string" ? body.prompt : "";

    if (!prompt.trim()) {
      return res.status(400).json({
        requestId,
        error: { code: "BAD_REQUEST", message: "prompt is required" }
      });
    }

    const overrides = parseOverrides(body);
    if (typeof overrides === "string") {
      return res.status(400).json({ requestId, error: { code: "BAD_REQUEST", message: overrides } });
    }

    try {
      const result = await runComparison(
        { prompt, overrides, forceCodexRuntime: body.forceCodexRuntime === true },
        { ...deps, env }
      );

      if (isTotalFailure(result)) {
        safeLog("[/api/compare] upstream_all_failed", { requestId });
        return res.status(502).json({
          requestId,
          error: { code: "UPSTREAM_ALL_FAILED", message: "All model calls failed" },
          result
        });
      }

      return res.status(200).json({ requestId, result });
    } catch (err: unknown) {
      safeLog("[/api/compare] internal_error", { requestId, error: errorMessage(err) });
      return res.status(500).json({ requestId, error: { code: "INTERNAL", message: errorMessage(err) } });
    }
  });

  app.get("/", (_req, res) => {
    res.type("text").send(`second-opinion ${getVersion()}`);
  });

  return app;
}
