import { Command } from "commander";
import {
  createRuntime,
  type Runtime,
} from "../application/bootstrap/runtimeFactory";
import {
  decodeEntityId,
  encodeEntityId,
  entityTypeLabel,
  entityTypes,
  isEntityType,
} from "../core/entities/entityId";
import type { LoaderRunReport } from "../core/entities/loader";
import {
  loadConfig,
  parseSourceList,
  type AppConfig,
} from "../shared/config/env";
import { logger } from "../shared/logger/logger";

type LoadQuotesOptions = {
  symbol?: string[];
  sources?: string;
  forceRefresh?: boolean;
  cache: boolean;
  failFast?: boolean;
};

const withRuntime = async <T>(
  config: AppConfig,
  action: (runtime: Runtime) => Promise<T>,
): Promise<T> => {
  const runtime = createRuntime(config);
  try {
    return await action(runtime);
  } finally {
    await runtime.close();
  }
};

/**
 * Applies per-invocation flags on top of the environment config.
 */
export const applyLoadOptions = (
  config: AppConfig,
  opts: LoadQuotesOptions,
): AppConfig => ({
  ...config,
  quoteSources: opts.sources
    ? parseSourceList(opts.sources)
    : config.quoteSources,
  cache: {
    ...config.cache,
    enabled: config.cache.enabled && opts.cache,
    forceRefresh: config.cache.forceRefresh || Boolean(opts.forceRefresh),
  },
  loader: {
    ...config.loader,
    continueOnError: config.loader.continueOnError && !opts.failFast,
  },
});

/**
 * One line per task plus a totals line.
 */
export const formatRunReport = (report: LoaderRunReport): string => {
  const lines = report.outcomes.map((outcome) => {
    const origin = outcome.fromCache ? "cache" : (outcome.source ?? "-");
    const detail = outcome.error
      ? ` ${outcome.error.code}: ${outcome.error.message}`
      : "";
    return `${outcome.symbol.padEnd(10)} ${outcome.state.padEnd(9)} ${origin}${detail}`;
  });

  lines.push(
    `${report.processName} ${report.state}: ${report.succeeded} succeeded, ${report.failed} failed, ${report.skipped} skipped, ${report.cacheHits} from cache`,
  );
  return lines.join("\n");
};

const parseSequence = (raw: string): bigint => {
  if (!/^\d+$/.test(raw.trim())) {
    throw new Error(
      `Sequence number must be a non-negative integer, got '${raw}'.`,
    );
  }
  return BigInt(raw.trim());
};

const parseId = (raw: string): bigint => {
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new Error(`Identifier must be an integer, got '${raw}'.`);
  }
  return BigInt.asIntN(64, BigInt(raw.trim()));
};

/**
 * Builds the command tree. `readConfig` is injectable so tests skip process.env.
 */
export const buildCli = (readConfig: () => AppConfig = () => loadConfig()) => {
  const cli = new Command();
  cli.name("marketfeed").description("Market data loader CLI");

  const symbols = cli
    .command("symbols")
    .description("Manage the symbol master");

  symbols
    .command("add")
    .description("Register a symbol under a new typed identifier")
    .requiredOption("--symbol <symbol>", "Ticker symbol")
    .option("--name <name>", "Display name")
    .option(
      "--type <type>",
      "Asset type, e.g. 'Common Stock' or 'ETF'",
      "equity",
    )
    .action(async (opts: { symbol: string; name?: string; type: string }) => {
      await withRuntime(readConfig(), async (runtime) => {
        const result = await runtime.symbolRegistry.register({
          symbol: opts.symbol,
          name: opts.name,
          assetType: opts.type,
        });
        if (result.isErr()) {
          throw new Error(result.error.message);
        }

        const { entity, created } = result.value;
        console.log(
          `${created ? "registered" : "exists"} ${entity.symbol} sid=${entity.sid} type=${entity.entityType}`,
        );
      });
    });

  symbols
    .command("list")
    .description("List registered symbols")
    .action(async () => {
      await withRuntime(readConfig(), async (runtime) => {
        const entries = await runtime.symbolRegistry.list();
        if (entries.length === 0) {
          console.log("No symbols registered.");
          return;
        }
        entries.forEach((entry) => {
          console.log(
            `${entry.symbol.padEnd(10)} ${entry.sid.toString().padStart(20)} ${entityTypeLabel(entry.entityType)}  ${entry.name}`,
          );
        });
      });
    });

  symbols
    .command("show")
    .description("Show a symbol, its source mappings and latest quote")
    .requiredOption("--symbol <symbol>", "Ticker symbol")
    .action(async (opts: { symbol: string }) => {
      await withRuntime(readConfig(), async (runtime) => {
        const tasks = await runtime.symbolRegistry.tasksFor([opts.symbol]);
        if (tasks.isErr()) {
          throw new Error(tasks.error.message);
        }
        const [task] = tasks.value;
        if (!task) {
          return;
        }

        const [mappings, quote] = await Promise.all([
          runtime.sourceMappings.listBySid(task.sid),
          runtime.quoteLoader.latest(task.sid),
        ]);
        const decoded = decodeEntityId(task.sid);
        console.log(
          `${task.symbol} sid=${task.sid} type=${decoded.type} seq=${decoded.seq}`,
        );
        mappings.forEach((mapping) => {
          console.log(
            `  ${mapping.sourceName}: ${mapping.sourceIdentifier} verified=${mapping.lastVerifiedAt?.toISOString() ?? "never"}`,
          );
        });
        console.log(
          quote
            ? `  quote: ${quote.price} from ${quote.source} as of ${quote.asOf.toISOString()}`
            : "  quote: none",
        );
      });
    });

  const sid = cli
    .command("sid")
    .description("Encode and decode typed identifiers");

  sid
    .command("encode")
    .argument("<type>", `One of: ${entityTypes.join(", ")}`)
    .argument("<seq>", "Sequence number")
    .action((type: string, seq: string) => {
      if (!isEntityType(type)) {
        throw new Error(`Unknown entity type '${type}'.`);
      }
      console.log(encodeEntityId(type, parseSequence(seq)).toString());
    });

  sid
    .command("decode")
    .argument("<id>", "Signed 64-bit identifier")
    .action((id: string) => {
      const decoded = decodeEntityId(parseId(id));
      console.log(`${decoded.type} ${decoded.seq}`);
    });

  const load = cli.command("load").description("Run data loaders");

  load
    .command("quotes")
    .description("Load latest quotes for registered symbols")
    .option("--symbol <symbols...>", "Only these symbols")
    .option("--sources <list>", "Comma-separated source priority override")
    .option(
      "--force-refresh",
      "Bypass cache reads; fresh responses are still cached",
    )
    .option("--no-cache", "Disable cache reads and writes")
    .option("--fail-fast", "Abort the run on the first failed task")
    .action(async (opts: LoadQuotesOptions) => {
      const config = applyLoadOptions(readConfig(), opts);
      await withRuntime(config, async (runtime) => {
        const tasks = await runtime.symbolRegistry.tasksFor(opts.symbol);
        if (tasks.isErr()) {
          throw new Error(tasks.error.message);
        }
        if (tasks.value.length === 0) {
          logger.warn("No symbols to load; register some with `symbols add`");
          return;
        }

        const report = await runtime.quoteLoader.load({ tasks: tasks.value });
        console.log(formatRunReport(report));
        if (report.state === "failed") {
          process.exitCode = 1;
        }
      });
    });

  const cache = cli
    .command("cache")
    .description("Maintain the response cache");

  cache
    .command("cleanup")
    .description("Delete expired cache rows")
    .option("--source <name>", "Only this source")
    .action(async (opts: { source?: string }) => {
      const config = readConfig();
      const targets = opts.source
        ? parseSourceList(opts.source)
        : config.quoteSources;
      await withRuntime(config, async (runtime) => {
        for (const source of targets) {
          const removed = await runtime.cache.cleanupExpired(source);
          console.log(`${source}: removed ${removed} expired row(s)`);
        }
      });
    });

  cli
    .command("status")
    .description("Report configuration, cache contents and recent runs")
    .action(async () => {
      await withRuntime(readConfig(), async (runtime) => {
        const [cacheSummary, runs] = await Promise.all([
          runtime.cache.summarize(),
          runtime.processTracker.recent(10),
        ]);

        logger.info(
          {
            storage: runtime.config.storageDriver,
            sources: runtime.config.quoteSources,
            loader: runtime.config.loader,
            cache: runtime.config.cache,
            cacheSummary,
            recentRuns: runs.map((run) => ({
              id: run.id,
              process: run.processName,
              state: run.endState,
              startedAt: run.startedAt.toISOString(),
              endedAt: run.endedAt?.toISOString() ?? null,
              records: run.recordsProcessed,
              error: run.errorMessage,
            })),
          },
          "Runtime status",
        );
      });
    });

  return cli;
};

export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
