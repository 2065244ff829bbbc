import * as path from "path";
import * as fs from "fs";
import * as dotenv from "dotenv";
import { AppArgs, AppEnv, CliArgv, IConfigService } from "./interfaces/IConfigService";
import { OutputFormat } from "./interfaces/RunOptions";

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_BYTES = 50 * 1024 * 1024; // 50MB

export class ConfigService implements IConfigService {
  constructor(private env: NodeJS.ProcessEnv = process.env) {}

  loadEnvironment(): AppEnv {
    // Optional local .env (gitignored) for the download cookie.
    const envPath = this.env.TEMPEST_PARSER_ENV || path.resolve(".env");
    if (fs.existsSync(envPath)) {
      const parsed = dotenv.parse(fs.readFileSync(envPath));
      for (const [key, value] of Object.entries(parsed)) {
        // Real environment wins over the file, as with dotenv.config().
        if (this.env[key] === undefined) this.env[key] = value;
      }
    }

    const cookie = this.env.TEMPEST_PARSER_COOKIE || undefined;
    const cookieDomains = (this.env.TEMPEST_PARSER_COOKIE_DOMAINS || "")
      .split(",")
      .map((d) => d.trim())
      .filter((d) => d.length > 0);

    return {
      cookie,
      cookieDomains,
      insecureTls: this.parseBoolean(this.env.TEMPEST_PARSER_INSECURE, true),
      timeoutMs: this.parsePositiveInt("TEMPEST_PARSER_TIMEOUT_MS", DEFAULT_TIMEOUT_MS),
      maxContentBytes: this.parsePositiveInt("TEMPEST_PARSER_MAX_BYTES", DEFAULT_MAX_BYTES),
      saveDownloads: this.parseBoolean(this.env.TEMPEST_PARSER_SAVE_DOWNLOADS, true),
      saveDir: path.resolve(this.env.TEMPEST_PARSER_SAVE_DIR || process.cwd()),
      format: this.parseFormat(this.env.TEMPEST_PARSER_FORMAT, "text"),
    };
  }

  loadArgs(argv: CliArgv, env: AppEnv): AppArgs {
    const timeoutMs = argv.timeout ?? env.timeoutMs;
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      throw new Error(`Invalid --timeout value: ${argv.timeout}. Expected a positive number of milliseconds.`);
    }

    return {
      source: argv.source,
      selfTest: argv.test ?? false,
      format: this.parseFormat(argv.format, env.format),
      saveDir: argv["save-dir"] ? path.resolve(argv["save-dir"]) : env.saveDir,
      saveDownloads: argv.save ?? env.saveDownloads,
      insecureTls: argv.insecure ?? env.insecureTls,
      timeoutMs,
    };
  }

  private parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
    if (value === undefined || value === "") return defaultValue;
    return value.toLowerCase() === "true";
  }

  private parsePositiveInt(name: string, defaultValue: number): number {
    const raw = this.env[name];
    if (raw === undefined || raw === "") return defaultValue;
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
      throw new Error(`Invalid ${name} value: ${raw}. Expected a positive integer.`);
    }
    return value;
  }

  private parseFormat(value: string | undefined, defaultValue: OutputFormat): OutputFormat {
    if (value === undefined || value === "") return defaultValue;
    const lowered = value.toLowerCase();
    if (lowered === "text" || lowered === "json") return lowered;
    throw new Error(`Invalid output format: ${value}. Expected "text" or "json".`);
  }
}
