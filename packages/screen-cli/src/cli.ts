#!/usr/bin/env -S node --import tsx
import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

import {
  createLogger,
  formatFailure,
  openLogSink,
  prettyCanonicalJson,
  readEnv,
  type Logger,
  type Result,
  type ScreenEnv,
} from "@concrete-screen/core";
import { buildRequirement, collectExtractions, runScreening, type ScreeningScenario } from "@concrete-screen/compliance";
import { createFileRegulationProvider, type RegulationProvider } from "@concrete-screen/regulations";

import { UsageError, listValue, parseFlagArgs, required, single, type ParsedFlags } from "./args.js";

export interface TextSink {
  write(chunk: string): unknown;
}

export interface CliIo {
  readonly stdout: TextSink;
  readonly stderr: TextSink;
  readonly env?: NodeJS.ProcessEnv;
}

export const EXIT_OK = 0;
export const EXIT_SCREENING_FAILED = 1;
export const EXIT_USAGE = 2;

export const HELP_TEXT =
  `concrete-screen: screen concrete product declarations against exposure-class requirements\n\n` +
  `Usage:\n` +
  `  concrete-screen regulations [--dir <path>]\n` +
  `  concrete-screen classes --regulation <id> [--mappings-dir <path>]\n` +
  `  concrete-screen requirements --regulation <id> [--classes <a,b>] [--user <file>] [--drawing <file>] [--dir <path>]\n` +
  `  concrete-screen check --regulation <id> [--classes <a,b>] [--user <file>] [--drawing <file>]\n` +
  `                        --epd <file> [--epd <file> ...] [--out <file>] [--dir <path>]\n` +
  `\n` +
  `Exit codes:\n` +
  `  0  every product passed\n` +
  `  1  at least one product failed or could not be screened\n` +
  `  2  CLI misuse or configuration error`;

const SCENARIO_FLAGS = ["--regulation", "--classes", "--user", "--drawing", "--dir", "--mappings-dir"];
const HELP_FLAGS = ["--help", "-h"];

interface CommandContext {
  readonly io: CliIo;
  readonly logger: Logger;
  readonly env: ScreenEnv;
}

function providerFor(parsed: ParsedFlags, ctx: CommandContext): RegulationProvider {
  return createFileRegulationProvider({
    regulationsDir: single(parsed, "--dir"),
    mappingsDir: single(parsed, "--mappings-dir"),
    env: ctx.env,
    logger: ctx.logger.child("regulations"),
  });
}

async function readJsonFile(filePath: string, label: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new UsageError(`cannot read ${label} file ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new UsageError(`invalid JSON in ${label} file ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

async function scenarioFrom(parsed: ParsedFlags): Promise<ScreeningScenario> {
  const userPath = single(parsed, "--user");
  const drawingPath = single(parsed, "--drawing");
  return {
    jurisdiction: required(parsed, "--regulation"),
    exposureClasses: listValue(parsed, "--classes"),
    user: userPath === undefined ? undefined : await readJsonFile(userPath, "user constraints"),
    drawing: drawingPath === undefined ? undefined : await readJsonFile(drawingPath, "drawing"),
  };
}

function reportFailure(result: Result<unknown>, ctx: CommandContext): number {
  ctx.io.stderr.write(`error: ${formatFailure(result)}\n`);
  return EXIT_USAGE;
}

function writeWarnings(warnings: readonly string[], ctx: CommandContext): void {
  for (const warning of warnings) {
    ctx.io.stderr.write(`warning: ${warning}\n`);
  }
}

async function runRegulations(args: string[], ctx: CommandContext): Promise<number> {
  const parsed = parseFlagArgs(args, ["--dir"]);
  const listed = providerFor(parsed, ctx).listJurisdictions();
  if (!listed.ok) return reportFailure(listed, ctx);
  for (const id of listed.value) {
    ctx.io.stdout.write(`${id}\n`);
  }
  return EXIT_OK;
}

async function runClasses(args: string[], ctx: CommandContext): Promise<number> {
  const parsed = parseFlagArgs(args, ["--regulation", "--mappings-dir", "--dir"]);
  const mapping = providerFor(parsed, ctx).loadExposureClassMapping(required(parsed, "--regulation"));
  if (!mapping.ok) return reportFailure(mapping, ctx);
  for (const code of Object.keys(mapping.value).sort()) {
    ctx.io.stdout.write(`${code}\t${mapping.value[code]}\n`);
  }
  return EXIT_OK;
}

async function runRequirements(args: string[], ctx: CommandContext): Promise<number> {
  const parsed = parseFlagArgs(args, SCENARIO_FLAGS);
  const scenario = await scenarioFrom(parsed);
  const built = buildRequirement(providerFor(parsed, ctx), scenario, ctx.logger);
  if (!built.ok) return reportFailure(built, ctx);
  writeWarnings(built.value.warnings, ctx);
  for (const sourceFailure of built.value.sourceFailures) {
    ctx.io.stderr.write(`warning: ${sourceFailure.source} ignored: ${sourceFailure.error.explain}\n`);
  }
  ctx.io.stdout.write(prettyCanonicalJson(built.value.requirement));
  return EXIT_OK;
}

async function runCheck(args: string[], ctx: CommandContext): Promise<number> {
  const parsed = parseFlagArgs(args, [...SCENARIO_FLAGS, "--epd", "--out"]);
  const epdPaths = parsed.values["--epd"] ?? [];
  if (epdPaths.length === 0) {
    throw new UsageError("missing required flag --epd");
  }
  const scenario = await scenarioFrom(parsed);
  const documents = await collectExtractions(
    epdPaths.map((epdPath) => ({
      id: epdPath,
      extract: async () => {
        const record: unknown = JSON.parse(await readFile(epdPath, "utf-8"));
        return record;
      },
    })),
  );

  const report = runScreening(providerFor(parsed, ctx), scenario, documents, ctx.logger);
  if (!report.ok) return reportFailure(report, ctx);
  writeWarnings(report.value.warnings, ctx);
  for (const sourceFailure of report.value.sourceFailures) {
    ctx.io.stderr.write(`warning: ${sourceFailure.source} ignored: ${sourceFailure.error.explain}\n`);
  }

  const body = prettyCanonicalJson(report.value);
  const outPath = single(parsed, "--out");
  if (outPath) {
    const target = path.resolve(outPath);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, body, "utf-8");
  } else {
    ctx.io.stdout.write(body);
  }
  const { total, passed, failed, errored } = report.value.summary;
  ctx.io.stderr.write(`screened ${total} products: ${passed} passed, ${failed} failed, ${errored} errored\n`);
  return failed + errored > 0 ? EXIT_SCREENING_FAILED : EXIT_OK;
}

const COMMANDS: Readonly<Record<string, (args: string[], ctx: CommandContext) => Promise<number>>> = {
  regulations: runRegulations,
  classes: runClasses,
  requirements: runRequirements,
  check: runCheck,
};

export async function runCli(
  argv: readonly string[],
  io: CliIo = { stdout: process.stdout, stderr: process.stderr },
): Promise<number> {
  const [command, ...rest] = argv;
  if (!command || HELP_FLAGS.includes(command) || command === "help") {
    io.stdout.write(`${HELP_TEXT}\n`);
    return EXIT_OK;
  }
  const handler = Object.prototype.hasOwnProperty.call(COMMANDS, command) ? COMMANDS[command] : undefined;
  if (!handler) {
    io.stderr.write(`unknown command: ${command}\n${HELP_TEXT}\n`);
    return EXIT_USAGE;
  }
  if (rest.some((arg) => HELP_FLAGS.includes(arg))) {
    io.stdout.write(`${HELP_TEXT}\n`);
    return EXIT_OK;
  }

  const env = readEnv(io.env ?? process.env);
  const logger = createLogger("cli", openLogSink(env.logTarget), env.logLevel);
  try {
    const code = await handler(rest, { io, logger, env });
    logger.debug("command finished", { command, code });
    return code;
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr.write(`error: ${err.message}\n`);
      return EXIT_USAGE;
    }
    throw err;
  }
}

const entryPath = fileURLToPath(import.meta.url);
const invokedPath = process.argv[1] ? path.resolve(process.argv[1]) : "";

if (entryPath === invokedPath) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
      process.exitCode = EXIT_USAGE;
    },
  );
}
