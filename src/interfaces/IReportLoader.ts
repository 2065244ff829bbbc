
export type LoaderOptions = {
    cookie?: string;
    cookieDomains: string[];
    insecureTls: boolean;
    timeoutMs: number;
    maxContentBytes: number;
    saveDownloads: boolean;
    saveDir: string;
};

export interface IReportLoader {
    /** Resolves to the HTML text of a local file or an http(s) URL. */
    load(source: string): Promise<string>;
}
