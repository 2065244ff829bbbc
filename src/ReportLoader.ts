import * as fs from "fs";
import * as https from "https";
import * as path from "path";
import axios, { AxiosInstance, AxiosRequestConfig, isAxiosError } from "axios";
import { FetchError } from "./errors";
import { ILogger } from "./interfaces/ILogger";
import { IReportLoader, LoaderOptions } from "./interfaces/IReportLoader";
import { downloadFileName, isSafePath } from "./utils/PathUtils";

const URL_PREFIX = /^https?:\/\//i;

export function isUrl(source: string): boolean {
    return URL_PREFIX.test(source);
}

export class ReportLoader implements IReportLoader {
    constructor(
        private options: LoaderOptions,
        private logger: ILogger,
        private http: AxiosInstance = axios.create()
    ) { }

    async load(source: string): Promise<string> {
        return isUrl(source) ? this.download(source) : this.readLocal(source);
    }

    private readLocal(filePath: string): string {
        this.logger.log(`Reading local file: ${filePath}`);

        let stats: fs.Stats;
        try {
            stats = fs.statSync(filePath);
        } catch (err) {
            throw new FetchError(`Cannot read report file ${filePath}: ${errorText(err)}`, filePath, undefined, { cause: err });
        }

        if (!stats.isFile()) {
            throw new FetchError(`Report path is not a file: ${filePath}`, filePath);
        }
        if (stats.size > this.options.maxContentBytes) {
            throw new FetchError(
                `Report file is too large (${(stats.size / 1024 / 1024).toFixed(2)}MB). Max allowed: ${formatMegabytes(this.options.maxContentBytes)}.`,
                filePath
            );
        }

        try {
            return fs.readFileSync(filePath, "utf-8");
        } catch (err) {
            throw new FetchError(`Cannot read report file ${filePath}: ${errorText(err)}`, filePath, undefined, { cause: err });
        }
    }

    private async download(url: string): Promise<string> {
        this.logger.log(`Downloading from URL: ${url}`);

        let html: string;
        try {
            const response = await this.http.get<string>(url, this.requestConfig(url));
            html = response.data;
        } catch (err) {
            if (isAxiosError(err)) {
                const status = err.response?.status;
                const reason = status ? `HTTP ${status}` : err.code || err.message;
                throw new FetchError(`Failed to download ${url}: ${reason}`, url, status, { cause: err });
            }
            throw new FetchError(`Failed to download ${url}: ${errorText(err)}`, url, undefined, { cause: err });
        }

        if (typeof html !== "string") {
            throw new FetchError(`Failed to download ${url}: response body is not text`, url);
        }

        if (this.options.saveDownloads) {
            this.saveCopy(url, html);
        }
        return html;
    }

    private requestConfig(url: string): AxiosRequestConfig {
        const config: AxiosRequestConfig = {
            responseType: "text",
            // Keep the body as-is; axios would otherwise try JSON.parse on it.
            transformResponse: [(data: string) => data],
            timeout: this.options.timeoutMs,
            maxContentLength: this.options.maxContentBytes,
            headers: {},
        };

        if (this.options.insecureTls) {
            config.httpsAgent = new https.Agent({ rejectUnauthorized: false });
        }

        const host = new URL(url).hostname;
        if (this.options.cookie && this.cookieAllowed(host)) {
            config.headers = { Cookie: this.options.cookie };
            this.logger.log(`Using configured cookie for host: ${host}`);
        }
        return config;
    }

    private cookieAllowed(host: string): boolean {
        const domains = this.options.cookieDomains;
        if (domains.length === 0) return true;
        return domains.some((domain) => {
            const bare = domain.replace(/^\./, "").toLowerCase();
            return host === bare || host.endsWith(`.${bare}`);
        });
    }

    private saveCopy(url: string, html: string): void {
        const saveDir = path.resolve(this.options.saveDir);
        const fileName = downloadFileName(url);
        const target = path.resolve(saveDir, fileName);

        if (!isSafePath(target, saveDir)) {
            this.logger.warn(`⚠️ Refusing to save download outside ${saveDir}: ${fileName}`);
            return;
        }

        try {
            fs.mkdirSync(saveDir, { recursive: true });
            fs.writeFileSync(target, html, "utf-8");
            this.logger.log(`Downloaded content to: ${target}`);
        } catch (err) {
            // The report is already in memory; a failed copy is not fatal.
            this.logger.warn(`⚠️ Could not save downloaded report to ${target}:`, err);
        }
    }
}

function errorText(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

function formatMegabytes(bytes: number): string {
    return `${+(bytes / 1024 / 1024).toFixed(2)}MB`;
}
