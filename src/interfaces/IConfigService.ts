import { OutputFormat } from "./RunOptions";

export type AppEnv = {
    cookie?: string;
    cookieDomains: string[];
    insecureTls: boolean;
    timeoutMs: number;
    maxContentBytes: number;
    saveDownloads: boolean;
    saveDir: string;
    format: OutputFormat;
};

/** The subset of parsed yargs output the config layer reads. */
export type CliArgv = {
    source?: string;
    test?: boolean;
    format?: string;
    "save-dir"?: string;
    save?: boolean;
    insecure?: boolean;
    timeout?: number;
};

export type AppArgs = {
    source?: string;
    selfTest: boolean;
    format: OutputFormat;
    saveDir: string;
    saveDownloads: boolean;
    insecureTls: boolean;
    timeoutMs: number;
};

export interface IConfigService {
    loadEnvironment(): AppEnv;
    loadArgs(argv: CliArgv, env: AppEnv): AppArgs;
}
