import yargsFactory from "yargs/yargs";
import { App, EXIT_ERROR } from "./App";
import { ConfigService } from "./config";
import { ConsoleLogger } from "./ConsoleLogger";
import { UsageError } from "./errors";
import { ILogger } from "./interfaces/ILogger";
import { ReportLoader } from "./ReportLoader";
import { TempestHtmlParser } from "./TempestHtmlParser";

const USAGE = "Usage: $0 <url_or_file>\n       $0 --test";

/**
 * Runs the command line; resolves to the process exit code. Usage errors are
 * reported through `errorLogger` and give EXIT_ERROR, never yargs' own exit.
 */
export async function main(args: string[], errorLogger: ILogger = new ConsoleLogger()): Promise<number> {
  try {
    return await runCli(args);
  } catch (err) {
    if (err instanceof UsageError) {
      errorLogger.error(`Error: ${err.message}`);
      errorLogger.error(USAGE.replace(/\$0/g, "tempest-report-parser"));
      return EXIT_ERROR;
    }
    throw err;
  }
}

async function runCli(args: string[]): Promise<number> {
  const argv = yargsFactory(args)
    .scriptName("tempest-report-parser")
    .usage(USAGE)
    .options({
      test: {
        type: "boolean",
        describe: "Run the parser against the bundled fixture pages",
      },
      format: {
        type: "string",
        choices: ["text", "json"],
        describe: "Output format (default: text, or TEMPEST_PARSER_FORMAT)",
      },
      "save-dir": {
        type: "string",
        describe: "Directory for downloaded reports (default: working directory)",
      },
      save: {
        type: "boolean",
        describe: "Keep a copy of downloaded reports (disable with --no-save)",
      },
      insecure: {
        type: "boolean",
        describe: "Skip TLS certificate verification for downloads (default: true)",
      },
      timeout: {
        type: "number",
        describe: "Download timeout in milliseconds",
      },
    })
    .strictOptions()
    .fail((msg, err) => {
      // Replaces yargs' handler, which would print help and exit(1).
      throw err ?? new UsageError(msg);
    })
    .parseSync();

  if (argv._.length > 1) {
    throw new UsageError(`Expected a single file or URL, got ${argv._.length}: ${argv._.join(" ")}`);
  }

  const configService = new ConfigService();
  const env = configService.loadEnvironment();
  const cli = configService.loadArgs(
    {
      source: argv._.length > 0 ? String(argv._[0]) : undefined,
      test: argv.test,
      format: argv.format,
      "save-dir": argv["save-dir"],
      save: argv.save,
      insecure: argv.insecure,
      timeout: argv.timeout,
    },
    env
  );

  const logger = new ConsoleLogger({ logToStderr: cli.format === "json" });
  const loader = new ReportLoader(
    {
      cookie: env.cookie,
      cookieDomains: env.cookieDomains,
      insecureTls: cli.insecureTls,
      timeoutMs: cli.timeoutMs,
      maxContentBytes: env.maxContentBytes,
      saveDownloads: cli.saveDownloads,
      saveDir: cli.saveDir,
    },
    logger
  );
  const app = new App(loader, new TempestHtmlParser(), logger);

  if (cli.selfTest) {
    if (cli.source) {
      throw new UsageError("--test does not take a file or URL");
    }
    return app.runSelfTest();
  }

  if (!cli.source) {
    throw new UsageError("Missing file or URL");
  }

  return app.run({ source: cli.source, format: cli.format });
}
