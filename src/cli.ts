#!/usr/bin/env node
import path from "node:path";
import { Command } from "commander";
import pc from "picocolors";
import { loadConfig, resolveStateDir } from "./config/loadConfig.js";
import { DEFAULT_THRESHOLD } from "./config/defaults.js";
import { loadSnippetCollection } from "./input/loadSnippets.js";
import { compare } from "./matching/matcher.js";
import {
  formatComparisonJson,
  formatComparisonText,
  needsAttention,
  summarizeComparison
} from "./report/formatters.js";
import { createAppLogger, noopLogger, type AppLogger, type Logger } from "./logging/logger.js";

const program = new Command();

// Invalid numbers are passed through so config validation reports them.
function parsePercent(value?: string): number | undefined {
  if (value === undefined) return undefined;
  return Number(value.trim());
}

program
  .name("snipcheck")
  .description("Check whether previously flagged findings still exist by comparing their code snippets across two scans");

program
  .command("compare <old> <new>")
  .description("Compare the snippet collections of an old and a new scan (JSON files)")
  .option("-t, --threshold <num>", `Similarity (0-100) at or above which a changed snippet counts as reviewed (default ${DEFAULT_THRESHOLD})`)
  .option("--min-pair-score <num>", "Lowest similarity (0-100) at which two snippets are paired at all")
  .option("-f, --format <format>", "Output format (text|json)")
  .option("--json", "Shortcut for --format json")
  .option("--config <path>", "Path to snipcheck.config.json")
  .option("--debug", "Enable debug logging")
  .option("--debug-log <path>", "Path to write debug log (implies --debug)")
  .action(async (oldPath: string, newPath: string, options: {
    threshold?: string;
    minPairScore?: string;
    format?: string;
    json?: boolean;
    config?: string;
    debug?: boolean;
    debugLog?: string;
  }) => {
    const projectRoot = process.cwd();
    const debug = Boolean(options.debug || options.debugLog);
    let appLogger: AppLogger | null = null;
    try {
      appLogger = await createAppLogger({
        stateDir: resolveStateDir(projectRoot),
        label: "compare",
        filePath: options.debugLog ? path.resolve(projectRoot, options.debugLog) : null,
        minLevel: debug ? "debug" : "info"
      });
    } catch {
      appLogger = null;
    }
    const appLog = appLogger ?? noopLogger;
    const uiLogger: Logger = {
      debug: (message, meta) => appLog.debug(message, meta),
      info: (message, meta) => appLog.info(message, meta),
      warn: (message, meta) => {
        appLog.warn(message, meta);
        console.error(pc.yellow(message));
      },
      error: (message, meta) => {
        appLog.error(message, meta);
        console.error(pc.red(message));
      }
    };

    try {
      const config = await loadConfig({
        projectRoot,
        configPath: options.config ?? null,
        overrides: {
          threshold: parsePercent(options.threshold),
          minPairScore: parsePercent(options.minPairScore),
          format: options.json ? "json" : options.format ?? null
        }
      });
      const started = Date.now();
      const [oldSnippets, newSnippets] = await Promise.all([
        loadSnippetCollection(oldPath),
        loadSnippetCollection(newPath)
      ]);
      uiLogger.info("Loaded snippet collections", {
        oldPath,
        newPath,
        oldCount: oldSnippets.size,
        newCount: newSnippets.size
      });

      const { threshold, minPairScore } = config.matching;
      const results = compare(oldSnippets, newSnippets, threshold, { minPairScore, logger: uiLogger });
      const summary = summarizeComparison(results);
      const durationMs = Date.now() - started;
      uiLogger.info("Comparison completed", { summary, durationMs });

      if (config.output.format === "json") {
        console.log(formatComparisonJson(results, { threshold }));
      } else {
        console.log(formatComparisonText(results, { threshold, durationMs, old: oldSnippets, new: newSnippets }));
        if (appLogger && debug) {
          console.log(pc.dim(`\nDebug log written to ${appLogger.path}`));
        }
      }

      process.exitCode = needsAttention(summary) ? 1 : 0;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      uiLogger.error(`Error: ${message}`);
      process.exitCode = 2;
    } finally {
      await appLogger?.close();
    }
  });

program.parse(process.argv);
