import fs from "node:fs";
import path from "node:path";
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { ConfigError, UsageError, errorMessage } from "./errors";
import type { FetchLike } from "./llm/http";
import { isTotalFailure, runComparison } from "./llm/orchestrator";
import { clampOverride } from "./llm/platform";
import { toJson, toMarkdown } from "./render";
import { loadDotEnv, resolveApiKey, type Env } from "./utils/env";
import { safeLog } from "./utils/redact";

export type CliIO = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: Env;
  cwd: string;
  fetchImpl?: FetchLike;
};

export type CompareCliOptions = {
  prompt?: string;
  promptFile?: string;
  repoRoot: string;
  forceCodexRuntime?: boolean;
  maxTokens?: number;
  temperature?: number;
  timeout?: number;
  format: "json" | "md";
  out?: string;
};

export type ServeCliOptions = {
  port: number;
  host: string;
  repoRoot: string;
};

function getVersion(): string {
  return process.env.npm_package_version ?? process.env.APP_VERSION ?? "dev";
}

function parseInteger(value: string): number {
  const n = Number(value);
  if (!value.trim() || !Number.isInteger(n)) throw new InvalidArgumentError("Not an integer.");
  return n;
}

function parseFloatArg(value: string): number {
  const n = Number(value);
  if (!value.trim() || !Number.isFinite(n)) throw new InvalidArgumentError("Not a number.");
  return n;
}

function parseMaxTokens(value: string): number {
  return clampOverride("maxTokens", parseInteger(value));
}

function parseTemperature(value: string): number {
  return clampOverride("temperature", parseFloatArg(value));
}

function parseTimeout(value: string): number {
  return clampOverride("timeoutSeconds", parseInteger(value));
}

function parsePort(value: string): number {
  const n = parseInteger(value);
  if (n < 0 || n > 65535) throw new InvalidArgumentError("Not a valid port.");
  return n;
}

function readPrompt(opts: CompareCliOptions, cwd: string): string {
  let prompt = opts.prompt ?? "";
  if (!prompt && opts.promptFile) {
    const promptPath = path.resolve(cwd, opts.promptFile);
    if (!fs.existsSync(promptPath)) throw new UsageError(`Prompt file not found: ${opts.promptFile}`);
    prompt = fs.readFileSync(promptPath, "utf8");
  }
  if (!prompt.trim()) throw new UsageError("Missing --prompt or --prompt-file");
  return prompt;
}

export async function runCompareCommand(opts: CompareCliOptions, io: CliIO): Promise<number> {
  const prompt = readPrompt(opts, io.cwd);
  const config = loadConfig(io.env);

  let apiKey: string;
  try {
    apiKey = resolveApiKey(path.resolve(io.cwd, opts.repoRoot), io.env);
  } catch (err: unknown) {
    if (!(err instanceof ConfigError)) throw err;
    io.stdout(toJson({ error: err.message, model_a: { error: "No API key" }, model_b: { error: "No API key" } }));
    return 1;
  }

  const result = await runComparison(
    {
      prompt,
      overrides: { maxTokens: opts.maxTokens, temperature: opts.temperature, timeoutSeconds: opts.timeout },
      forceCodexRuntime: opts.forceCodexRuntime === true
    },
    { apiKey, config, env: io.env, fetchImpl: io.fetchImpl }
  );

  if (isTotalFailure(result)) {
    io.stdout(toJson({ error: "All model calls failed", ...result }));
    return 1;
  }

  const rendered = opts.format === "md" ? toMarkdown(result) : toJson(result);
  if (!opts.out) {
    io.stdout(rendered);
    return 0;
  }

  const outPath = path.resolve(io.cwd, opts.out);
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  fs.writeFileSync(outPath, rendered, "utf8");
  safeLog("[compare] wrote result", { path: outPath });
  return 0;
}

export async function runServeCommand(opts: ServeCliOptions, io: CliIO): Promise<number> {
  const repoRoot = path.resolve(io.cwd, opts.repoRoot);
  loadDotEnv(repoRoot);

  let apiKey: string;
  try {
    apiKey = resolveApiKey(repoRoot, io.env);
  } catch (err: unknown) {
    if (!(err instanceof ConfigError)) throw err;
    io.stderr(`${err.message}\n`);
    return 1;
  }

  const app = createApp({ apiKey, config: loadConfig(io.env), env: io.env, fetchImpl: io.fetchImpl });
  await new Promise<void>((resolve, reject) => {
    const server = app.listen(opts.port, opts.host, () => {
      safeLog("[serve] listening", { host: opts.host, port: opts.port, version: getVersion() });
      resolve();
    });
    server.once("error", reject);
  });
  return 0;
}

export function buildProgram(io: CliIO, onExit: (code: number) => void): Command {
  const program = new Command();
  program
    .name("second-opinion")
    .description("Send one writing prompt to two models in parallel and compare the drafts")
    .version(getVersion())
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });

  program
    .command("compare")
    .description("Draft with two models in parallel and print both results")
    .option("--prompt <text>", "The full formatted prompt to send to both models")
    .option("--prompt-file <path>", "Read the prompt from a file")
    .option("--repo-root <dir>", "Directory holding the .env file", ".")
    .option("--force-codex-runtime", "Treat the host as Codex CLI (Opus replaces GPT)")
    .option("--max-tokens <n>", "Visible output tokens per model", parseMaxTokens)
    .option("--temperature <x>", "Sampling temperature", parseTemperature)
    .option("--timeout <seconds>", "Per-call timeout in seconds", parseTimeout)
    .addOption(new Option("--format <format>", "Output format").choices(["json", "md"]).default("json"))
    .option("--out <path>", "Write the result to a file instead of stdout")
    .action(async (opts: CompareCliOptions) => {
      onExit(await runCompareCommand(opts, io));
    });

  program
    .command("serve")
    .description("Expose the comparison over HTTP")
    .option("--port <n>", "Port to listen on", parsePort, 3000)
    .option("--host <host>", "Interface to bind", "127.0.0.1")
    .option("--repo-root <dir>", "Directory holding the .env file", ".")
    .action(async (opts: ServeCliOptions) => {
      onExit(await runServeCommand(opts, io));
    });

  return program;
}

/** Exit codes: 0 success (partial results included), 1 configuration or total failure, 2 usage. */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  let exitCode = 0;
  const program = buildProgram(io, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv);
  } catch (err: unknown) {
    if (err instanceof CommanderError) return err.exitCode === 0 ? 0 : 2;
    if (err instanceof UsageError) {
      io.stderr(`${err.message}\n`);
      return 2;
    }
    io.stderr(`${errorMessage(err)}\n`);
    return 1;
  }
  return exitCode;
}
