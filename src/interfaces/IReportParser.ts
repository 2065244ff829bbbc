
export type TestOutcome = "PASS" | "FAIL" | "ERROR" | "SKIP";

export type TestResult = {
    name: string;
    outcome: TestOutcome;
    detail?: string;
};

export type ReportSummary = {
    total: number;
    passed: number;
    failed: number;
    errored: number;
    skipped: number;
};

export type ParsedReport = {
    results: TestResult[];
    summary: ReportSummary;
};

export interface IReportParser {
    parse(html: string): ParsedReport;
}
