export type OutputFormat = "text" | "json";

export interface RunOptions {
    source: string;
    format: OutputFormat;
}
