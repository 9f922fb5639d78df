import { writeFile } from "node:fs/promises";
import {
  applyCliOptions,
  loadConfig,
  MAX_STORY_COUNT,
  MIN_STORY_COUNT,
  parseMode,
  type AppConfig,
  type CliOptions,
} from "./config";
import { BackendUnavailableError, ConfigError, ProviderUnavailableError } from "./errors";
import { HackerNewsProvider } from "./hackernews";
import { isLogThreshold, logger, setLogLevel } from "./logger";
import { SummaryPipeline } from "./pipeline";
import { exitCodeFor, renderReport } from "./render";
import { BasicSummarizer, buildSummarizer } from "./summarizers";
import type { ContentProvider, PipelineReport, Summarizer } from "./types";

export type CliArgs = {
  options: CliOptions;
  output?: string;
  help: boolean;
};

export interface CliDeps {
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  writeFile: (path: string, data: string) => Promise<void>;
  createProvider: (config: AppConfig) => ContentProvider;
  createSummarizer: (config: AppConfig) => Summarizer;
  sleep?: (ms: number) => Promise<void>;
}

export const USAGE = [
  "Usage: hn-brief [options]",
  "",
  "Fetch and summarize the top Hacker News stories.",
  "",
  "Options:",
  `  -c, --count <n>         Number of stories (${MIN_STORY_COUNT}-${MAX_STORY_COUNT}, default: $STORY_COUNT or 20)`,
  "  -m, --mode <mode>       basic | local-model | cloud-model (default: basic)",
  "  -o, --output <file>     Write the report to a file instead of stdout",
  "      --fallback          Degrade to basic summaries when the model backend fails",
  "      --no-fallback       Abort the run when the model backend fails (default)",
  "      --model <name>      Local model name (local-model only)",
  "      --max-comments <n>  Comments fed to enhanced summaries (default: 10)",
  "      --delay-ms <ms>     Pause between stories (default: 1000)",
  "      --log-level <lvl>   debug | info | warn | error | silent",
  "  -h, --help              Show this help",
].join("\n");

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { options: {}, help: false };

  for (let i = 0; i < argv.length; i++) {
    let flag = argv[i];
    let inline: string | undefined;
    const eq = flag.indexOf("=");
    if (flag.startsWith("--") && eq > 0) {
      inline = flag.slice(eq + 1);
      flag = flag.slice(0, eq);
    }
    const value = (): string => {
      const v = inline ?? argv[++i];
      if (v === undefined || v === "") throw new ConfigError(`Missing value for ${flag}`);
      return v;
    };

    switch (flag) {
      case "-c":
      case "--count":
        args.options.count = parseIntInRange(flag, value(), MIN_STORY_COUNT, MAX_STORY_COUNT);
        break;
      case "-m":
      case "--mode":
        args.options.mode = parseMode(value());
        break;
      case "-o":
      case "--output":
        args.output = value();
        break;
      case "--fallback":
        args.options.fallback = true;
        break;
      case "--no-fallback":
        args.options.fallback = false;
        break;
      case "--model":
        args.options.model = value();
        break;
      case "--max-comments":
        args.options.maxComments = parseIntInRange(flag, value(), 1, 100);
        break;
      case "--delay-ms":
        args.options.delayMs = parseIntInRange(flag, value(), 0, 60_000);
        break;
      case "--log-level": {
        const level = value().toLowerCase();
        if (!isLogThreshold(level)) throw new ConfigError(`Invalid value for --log-level: ${level}`);
        args.options.logLevel = level;
        break;
      }
      case "-h":
      case "--help":
        args.help = true;
        break;
      default:
        throw new ConfigError(`Unknown option: ${flag}`);
    }
  }

  return args;
}

function parseIntInRange(flag: string, raw: string, min: number, max: number): number {
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new ConfigError(
      `Invalid value for ${flag}: ${raw} (expected an integer between ${min} and ${max})`
    );
  }
  return parsed;
}

export function defaultDeps(): CliDeps {
  return {
    env: process.env,
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    writeFile: (path, data) => writeFile(path, data, "utf8"),
    createProvider: (config) => new HackerNewsProvider(config),
    createSummarizer: buildSummarizer,
  };
}

/** Runs one summarization pass and resolves to the process exit code. */
export async function run(argv: string[], deps: CliDeps = defaultDeps()): Promise<number> {
  let args: CliArgs;
  let config: AppConfig;
  let summarizer: Summarizer;
  try {
    args = parseArgs(argv);
    if (args.help) {
      deps.stdout(`${USAGE}\n`);
      return 0;
    }
    config = applyCliOptions(loadConfig(deps.env), args.options);
    setLogLevel(config.logLevel);
    summarizer = deps.createSummarizer(config);
  } catch (error) {
    if (error instanceof ConfigError) {
      deps.stderr(`Error: ${error.message}\n\n${USAGE}\n`);
      return 2;
    }
    throw error;
  }

  deps.stderr(`Fetching top ${config.storyCount} Hacker News articles (mode: ${config.mode})...\n`);

  const pipeline = new SummaryPipeline({
    provider: deps.createProvider(config),
    summarizer,
    fallback: new BasicSummarizer(config.basic),
    options: {
      storyCount: config.storyCount,
      fallbackEnabled: config.fallbackEnabled,
      maxComments: config.maxComments,
      delayMs: config.delayMs,
    },
    sleep: deps.sleep,
  });

  let report: PipelineReport;
  try {
    report = await pipeline.run();
  } catch (error) {
    if (error instanceof ProviderUnavailableError || error instanceof BackendUnavailableError) {
      logger.error("run.fatal", { name: error.name, error: error.message });
      const hint =
        error instanceof BackendUnavailableError
          ? "\nRe-run with --fallback to use basic summaries when the model backend fails."
          : "";
      deps.stderr(`Error: ${error.message}${hint}\n`);
      return 1;
    }
    throw error;
  }

  const text = renderReport(report);
  if (args.output) {
    await deps.writeFile(args.output, text);
    deps.stderr(`Report written to ${args.output}\n`);
  } else {
    deps.stdout(text);
  }
  return exitCodeFor(report.counts);
}
